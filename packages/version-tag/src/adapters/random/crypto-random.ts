import { randomBytes } from "node:crypto"
import type { RandomSource } from "../../ports/random-source"

export const cryptoRandom: RandomSource = {
  nextU64: () => randomBytes(8).readBigUInt64BE(),
}
