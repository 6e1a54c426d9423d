import { NullLogger } from "@vtag/logger"
import { captureLogger } from "../../../tests/capture-logger"
import { sequenceRandom } from "../../../tests/sequence-random"
import type { TagConfig } from "../../config/tag-config"
import { createTagRuntime } from "../create-tag-runtime"

const baseConfig = (patch: Partial<TagConfig> = {}): TagConfig => ({
  name: "test",
  sharedMemory: false,
  counter: { start: 1n },
  instance: {},
  logging: { level: "info", prettify: false, serviceName: "version-tag" },
  ...patch,
})

describe("createTagRuntime", () => {
  it("names the runtime from config", () => {
    const runtime = createTagRuntime(baseConfig(), { logger: new NullLogger() })

    expect(runtime.name).toBe("test")
  })

  it.each([true, false])("starts the counter at counter.start (sharedMemory=%s)", (shared) => {
    const config = baseConfig({ sharedMemory: shared, counter: { start: 50n } })
    const runtime = createTagRuntime(config, { logger: new NullLogger() })

    expect(runtime.fresh().ordinal).toBe(50n)
    expect(runtime.fresh().ordinal).toBe(51n)
  })

  it("pins the instance id when configured", () => {
    const random = sequenceRandom(7n)
    const runtime = createTagRuntime(baseConfig({ instance: { id: 0xffn } }), {
      logger: new NullLogger(),
      random,
    })

    expect(runtime.share(runtime.fresh()).instanceId).toBe(0xffn)
    expect(random.calls).toBe(0)
  })

  it.each([true, false])("draws the instance id once when not pinned (sharedMemory=%s)", (shared) => {
    const random = sequenceRandom(7n, 8n)
    const runtime = createTagRuntime(baseConfig({ sharedMemory: shared }), {
      logger: new NullLogger(),
      random,
    })

    expect(runtime.share(runtime.fresh()).instanceId).toBe(7n)
    expect(runtime.share(runtime.fresh()).instanceId).toBe(7n)
    expect(random.calls).toBe(1)
  })

  it("logs its setup through the injected logger", () => {
    const { logger, lines } = captureLogger()

    createTagRuntime(baseConfig({ instance: { id: 0xabn }, counter: { start: 9n } }), { logger })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 20,
      msg: "tag runtime created",
      runtime: "test",
      sharedMemory: false,
      counterStart: "9",
      instanceId: "00000000000000ab",
    })
  })

  it("builds a pino logger from config when none is injected", () => {
    const logging = { level: "fatal", prettify: false, serviceName: "tags" } as const
    const runtime = createTagRuntime(baseConfig({ logging }))

    expect(runtime.fresh().ordinal).toBe(1n)
  })
})
