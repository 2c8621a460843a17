import fs from 'node:fs/promises'
import { afterEach, describe, expect, it } from 'vitest'
import { createPipelineRuntime, type PipelineRuntime } from '..'
import { defaultStubStages, makeDataRoot, TEST_SETTINGS } from './pipelineHarness'

const activeTimeouts = (): number => process.getActiveResourcesInfo().filter((kind) => kind === 'Timeout').length

describe('Dispatcher', () => {
  const runtimes: PipelineRuntime[] = []
  const roots: string[] = []

  const open = async (keepAlive: boolean): Promise<PipelineRuntime> => {
    const root = await makeDataRoot()
    roots.push(root)
    const runtime = createPipelineRuntime({
      dataRoot: root,
      dbPath: ':memory:',
      settings: TEST_SETTINGS,
      stages: defaultStubStages(),
      keepAlive,
    })
    runtimes.push(runtime)
    return runtime
  }

  afterEach(async () => {
    for (const runtime of runtimes.splice(0)) {
      await runtime.shutdown()
    }
    for (const root of roots.splice(0)) {
      await fs.rm(root, { recursive: true, force: true })
    }
  })

  it('holds the process open through its poll timer only when asked to', async () => {
    const embedded = await open(false)
    const standalone = await open(true)
    const baseline = activeTimeouts()

    embedded.start()
    expect(activeTimeouts()).toBe(baseline)

    standalone.start()
    expect(activeTimeouts()).toBe(baseline + 1)

    await standalone.dispatcher.stop()
    expect(activeTimeouts()).toBe(baseline)
  })
})
