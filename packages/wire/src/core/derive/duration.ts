import type { Codec } from "../../ports/codec"
import { u32, u64, via } from "../codecs"
import { struct } from "./struct"

export type Duration = {
  seconds: bigint
  /** Below one second's worth. */
  nanoseconds: number
}

const NANOS_PER_SECOND = 1_000_000_000
const MAX_SECONDS = 0xffff_ffff_ffff_ffffn

const DurationParts = struct("Duration", { seconds: u64, nanoseconds: u32 })

/**
 * A span of time: u64 whole seconds, then u32 nanoseconds. Nanoseconds of
 * a second or more carry into the seconds on decode.
 */
export const duration: Codec<Duration> = via(DurationParts, {
  name: "Duration",
  to: (value: Duration) => {
    if (value.nanoseconds >= NANOS_PER_SECOND) {
      throw new Error(`nanoseconds must be below ${NANOS_PER_SECOND}`)
    }
    return value
  },
  from: ({ seconds, nanoseconds }) => {
    const carried = seconds + BigInt(Math.floor(nanoseconds / NANOS_PER_SECOND))

    if (carried > MAX_SECONDS) throw new Error("seconds overflow u64")

    return { seconds: carried, nanoseconds: nanoseconds % NANOS_PER_SECOND }
  },
})
