import type { InstanceIdSource } from "../../ports/instance-id"
import type { OrdinalCounter } from "../../ports/ordinal-counter"
import { defaultCounter, defaultInstanceId } from "../defaults"
import type { SharedTag } from "../shared/shared-tag"
import type { VersionTag } from "../version-tag"
import { TagRuntime } from "./tag-runtime"

// Read the bindings on every call so attachDefaults() reaches this runtime too.
const counter: OrdinalCounter = {
  issue: () => defaultCounter.issue(),
  peek: () => defaultCounter.peek(),
}

const instance: InstanceIdSource = {
  get: () => defaultInstanceId.get(),
}

export const defaultRuntime = new TagRuntime({ counter, instance }, { name: "default" })

export const fresh = (): VersionTag => defaultRuntime.fresh()

export const zero = (): VersionTag => defaultRuntime.zero()

export const share = (tag: VersionTag): SharedTag => defaultRuntime.share(tag)
