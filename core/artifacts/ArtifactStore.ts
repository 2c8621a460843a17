import { randomUUID } from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'
import type { ArtifactDao } from '../db/dao'
import type { ArtifactRecord, ArtifactState, ArtifactType, StageName } from '../db/types'
import { FatalError, ResourceError, toErrorMessage } from '../job-engine/errors'
import type { ArtifactWriteInput, StageArtifactWriter } from '../job-engine/types'

export interface PutArtifactInput {
  attemptId: number
  artifactType: ArtifactType
  name: string
  mimeType?: string | null
}

function assertPlainFileName(name: string): void {
  if (!name || name !== path.basename(name) || name === '.' || name === '..') {
    throw new FatalError(`Invalid artifact name: ${name}`)
  }
}

/**
 * Job-scoped file area. Files live under
 * `<root>/<jobId>/<stage>/<attemptId>/<name>` and are indexed in the
 * `artifacts` table; a file only becomes authoritative when the engine commits
 * its attempt.
 */
export class ArtifactStore {
  constructor(
    private readonly deps: {
      artifactsRoot: string
      artifactDao: ArtifactDao
    },
  ) {}

  attemptDir(jobId: string, stageName: StageName, attemptId: number): string {
    return path.join(this.deps.artifactsRoot, jobId, stageName, String(attemptId))
  }

  /** Write bytes as a pending artifact and return its index record. */
  async put(
    jobId: string,
    stageName: StageName,
    bytes: Buffer | string,
    input: PutArtifactInput,
  ): Promise<ArtifactRecord> {
    assertPlainFileName(input.name)
    const targetDir = this.attemptDir(jobId, stageName, input.attemptId)
    const targetPath = path.join(targetDir, input.name)
    const tempPath = `${targetPath}.tmp-${randomUUID().slice(0, 8)}`

    try {
      await fs.mkdir(targetDir, { recursive: true })
      await fs.writeFile(tempPath, bytes)
      await fs.rename(tempPath, targetPath)
    } catch (error) {
      await fs.rm(tempPath, { force: true })
      throw new ResourceError(`Failed to write artifact ${input.name}: ${toErrorMessage(error)}`, {
        cause: error,
      })
    }

    return this.index(jobId, stageName, targetPath, input)
  }

  /** Move an existing file (a subprocess output) into the store as a pending artifact. */
  async adopt(
    jobId: string,
    stageName: StageName,
    filePath: string,
    input: PutArtifactInput,
  ): Promise<ArtifactRecord> {
    assertPlainFileName(input.name)
    const targetDir = this.attemptDir(jobId, stageName, input.attemptId)
    const targetPath = path.join(targetDir, input.name)

    try {
      await fs.mkdir(targetDir, { recursive: true })
      await fs.rename(filePath, targetPath)
    } catch (error) {
      throw new ResourceError(`Failed to store artifact ${input.name}: ${toErrorMessage(error)}`, {
        cause: error,
      })
    }

    return this.index(jobId, stageName, targetPath, input)
  }

  async get(locator: string): Promise<Buffer> {
    const record = this.deps.artifactDao.findByLocator(locator)
    if (!record) {
      throw new ResourceError(`Unknown artifact locator: ${locator}`)
    }
    try {
      return await fs.readFile(this.resolveLocator(locator))
    } catch (error) {
      throw new ResourceError(`Failed to read artifact ${locator}: ${toErrorMessage(error)}`, { cause: error })
    }
  }

  /** Absolute path of a locator, for tools that need a file on disk. */
  resolveLocator(locator: string): string {
    const resolved = path.resolve(this.deps.artifactsRoot, locator)
    const root = path.resolve(this.deps.artifactsRoot)
    if (!resolved.startsWith(`${root}${path.sep}`)) {
      throw new FatalError(`Artifact locator escapes the store: ${locator}`)
    }
    return resolved
  }

  listByJob(jobId: string, state?: ArtifactState): ArtifactRecord[] {
    return this.deps.artifactDao.listArtifacts(jobId, state)
  }

  createWriter(jobId: string, stageName: StageName, attemptId: number): StageArtifactWriter {
    const written: ArtifactRecord[] = []
    const track = (record: ArtifactRecord): ArtifactRecord => {
      written.push(record)
      return record
    }

    return {
      write: async (input: ArtifactWriteInput) =>
        track(
          await this.put(jobId, stageName, input.data, {
            attemptId,
            artifactType: input.artifactType,
            name: input.name,
            mimeType: input.mimeType,
          }),
        ),
      writeJson: async (artifactType, name, value) =>
        track(
          await this.put(jobId, stageName, `${JSON.stringify(value, null, 2)}\n`, {
            attemptId,
            artifactType,
            name,
            mimeType: 'application/json',
          }),
        ),
      adopt: async (input) =>
        track(
          await this.adopt(jobId, stageName, input.filePath, {
            attemptId,
            artifactType: input.artifactType,
            name: input.name,
            mimeType: input.mimeType,
          }),
        ),
      written: () => [...written],
    }
  }

  private async index(
    jobId: string,
    stageName: StageName,
    targetPath: string,
    input: PutArtifactInput,
  ): Promise<ArtifactRecord> {
    const stat = await fs.stat(targetPath)
    return this.deps.artifactDao.addPending({
      jobId,
      stageName,
      attemptId: input.attemptId,
      artifactType: input.artifactType,
      name: input.name,
      locator: path.relative(this.deps.artifactsRoot, targetPath).split(path.sep).join('/'),
      fileSize: stat.size,
      mimeType: input.mimeType ?? null,
    })
  }
}
