import { BaseError } from "@vtag/errors"
import { loadTagConfig, mapEnvToConfig } from "../load-tag-config"
import { tagEnvSchema } from "../schema"

describe("loadTagConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it("falls back to defaults for an empty environment", async () => {
    const config = await loadTagConfig({ env: {} })

    expect(config).toEqual({
      name: "default",
      sharedMemory: true,
      counter: { start: 1n },
      instance: {},
      logging: { level: "info", prettify: false, serviceName: "version-tag" },
    })
  })

  it("reads VTAG_ variables and ignores everything else", async () => {
    const config = await loadTagConfig({
      env: {
        VTAG_RUNTIME_NAME: "orders",
        VTAG_SERVICE_NAME: "orders-api",
        VTAG_SHARED_MEMORY: "false",
        VTAG_COUNTER_START: "1000",
        VTAG_INSTANCE_ID: "00000000000000FF",
        VTAG_LOG_LEVEL: "debug",
        VTAG_LOG_PRETTY: "true",
        COUNTER_START: "5",
      },
    })

    expect(config).toEqual({
      name: "orders",
      sharedMemory: false,
      counter: { start: 1000n },
      instance: { id: 0xffn },
      logging: { level: "debug", prettify: true, serviceName: "orders-api" },
    })
  })

  it("applies overrides over the environment", async () => {
    const config = await loadTagConfig({
      env: { VTAG_COUNTER_START: "10" },
      overrides: { COUNTER_START: 500n, SHARED_MEMORY: false },
    })

    expect(config.counter.start).toBe(500n)
    expect(config.sharedMemory).toBe(false)
  })

  it("reads process.env by default", async () => {
    vi.stubEnv("VTAG_COUNTER_START", "77")

    const config = await loadTagConfig()

    expect(config.counter.start).toBe(77n)
  })

  it.each([
    ["VTAG_COUNTER_START", "0"],
    ["VTAG_COUNTER_START", "abc"],
    ["VTAG_COUNTER_START", "18446744073709551616"],
    ["VTAG_INSTANCE_ID", "ff"],
    ["VTAG_INSTANCE_ID", "zzzzzzzzzzzzzzzz"],
    ["VTAG_INSTANCE_ID", "0000000000000000"],
    ["VTAG_LOG_LEVEL", "verbose"],
    ["VTAG_SHARED_MEMORY", "maybe"],
  ])("rejects %s=%s", async (key, value) => {
    const error = await loadTagConfig({ env: { [key]: value } }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(BaseError)
    expect(error).toMatchObject({
      code: "invalid_config",
      context: { keys: [key.replace("VTAG_", "")] },
    })
  })

  it("names the variable's source when it fails validation", async () => {
    const error = await loadTagConfig({ env: { VTAG_COUNTER_START: "0" } }).catch(
      (err: unknown) => err,
    )

    expect(error).toMatchObject({
      code: "invalid_config",
      context: { suppliedBy: { COUNTER_START: "env:VTAG_" } },
    })
  })

  it("treats an empty VTAG_INSTANCE_ID as unset", async () => {
    const config = await loadTagConfig({ env: { VTAG_INSTANCE_ID: "" } })

    expect(config.instance).toEqual({})
  })
})

describe("mapEnvToConfig", () => {
  it("leaves the instance id unset when absent", () => {
    const config = mapEnvToConfig(tagEnvSchema.parse({}))

    expect(config.instance).toEqual({})
    expect("id" in config.instance).toBe(false)
  })

  it("parses a hex instance id", () => {
    const config = mapEnvToConfig(tagEnvSchema.parse({ INSTANCE_ID: "0123456789abcdef" }))

    expect(config.instance.id).toBe(0x0123456789abcdefn)
  })
})
