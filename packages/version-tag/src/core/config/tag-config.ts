import type { LogLevelName } from "@vtag/logger"
import type { InstanceId } from "../../ports/instance-id"
import type { Ordinal } from "../../ports/ordinal-counter"

export interface TagConfig {
  name: string

  /**
   * Keep the counter and instance id in `SharedArrayBuffer`s so worker
   * threads can share them.
   */
  sharedMemory: boolean

  counter: {
    start: Ordinal
  }

  instance: {
    /** Pinned instance id; drawn at random on first use when absent. */
    id?: InstanceId
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
