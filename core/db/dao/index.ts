export { ArtifactDao } from './ArtifactDao'
export { JobDao } from './JobDao'
export type { JobPatch } from './JobDao'
export { JobQueueDao } from './JobQueueDao'
export { DEFAULT_SETTINGS, SettingsDao } from './SettingsDao'
export { StageAttemptDao } from './StageAttemptDao'
export type { AttemptError } from './StageAttemptDao'
