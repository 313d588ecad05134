import type { Codec } from "../../../ports/codec"
import { fromBytes, toBytes } from "../../wire"
import { f32, f64 } from "../floats"
import { i128, i16, i32, i64, i8, u128, u16, u32, u64, u8 } from "../integers"
import { bool, never, unit } from "../scalars"

describe("bool", () => {
  it("encodes true as 0x01 and false as 0x00", async () => {
    expect(await toBytes(bool, true)).toEqual(new Uint8Array([0x01]))
    expect(await toBytes(bool, false)).toEqual(new Uint8Array([0x00]))
  })

  it("rejects any other byte as invalid_bool", async () => {
    await expect(fromBytes(bool, new Uint8Array([0x02]))).rejects.toMatchObject({
      code: "invalid_bool",
      context: { byte: 2, path: "bool" },
    })
  })
})

describe("integers", () => {
  it("writes big-endian with a fixed width", async () => {
    expect(await toBytes(u8, 200)).toEqual(new Uint8Array([200]))
    expect(await toBytes(i8, -1)).toEqual(new Uint8Array([0xff]))
    expect(await toBytes(u16, 300)).toEqual(new Uint8Array([0x01, 0x2c]))
    expect(await toBytes(i16, -2)).toEqual(new Uint8Array([0xff, 0xfe]))
    expect(await toBytes(u32, 7)).toEqual(new Uint8Array([0, 0, 0, 7]))
    expect(await toBytes(i32, -1)).toEqual(new Uint8Array([0xff, 0xff, 0xff, 0xff]))
    expect(await toBytes(u64, 2n ** 40n)).toEqual(new Uint8Array([0, 0, 1, 0, 0, 0, 0, 0]))
    expect(await toBytes(i64, -1n)).toEqual(new Uint8Array(8).fill(0xff))
  })

  it("writes 128-bit values as two 64-bit halves, high first", async () => {
    const one = new Uint8Array(16)
    one[15] = 1

    const minusTwo = new Uint8Array(16).fill(0xff)
    minusTwo[15] = 0xfe

    expect(await toBytes(u128, 1n)).toEqual(one)
    expect(await toBytes(i128, -2n)).toEqual(minusTwo)
  })

  it("decodes the extremes of each width", async () => {
    const cases: Array<[Codec<number>, number]> = [
      [u8, 255],
      [i8, -128],
      [u16, 65535],
      [i16, -32768],
      [u32, 4294967295],
      [i32, -2147483648],
    ]

    for (const [codec, value] of cases) {
      expect(await fromBytes(codec, await toBytes(codec, value))).toBe(value)
    }

    const big: Array<[Codec<bigint>, bigint]> = [
      [u64, 2n ** 64n - 1n],
      [i64, -(2n ** 63n)],
      [u128, 2n ** 128n - 1n],
      [i128, -(2n ** 127n)],
      [i128, 2n ** 127n - 1n],
    ]

    for (const [codec, value] of big) {
      expect(await fromBytes(codec, await toBytes(codec, value))).toBe(value)
    }
  })

  it("refuses values outside the range or not integral", async () => {
    await expect(toBytes(u8, 256)).rejects.toMatchObject({
      code: "invalid_value",
      context: { type: "u8", path: "u8" },
    })
    await expect(toBytes(u8, 1.5)).rejects.toMatchObject({ code: "invalid_value" })
    await expect(toBytes(i8, -129)).rejects.toMatchObject({ code: "invalid_value" })
    await expect(toBytes(u64, -1n)).rejects.toMatchObject({ code: "invalid_value" })
    await expect(toBytes(i128, 2n ** 127n)).rejects.toMatchObject({ code: "invalid_value" })
  })

  it("never returns a partial integer when the stream ends early", async () => {
    await expect(fromBytes(u32, new Uint8Array([0, 7]))).rejects.toMatchObject({
      code: "end_of_stream",
      context: { expected: 4, received: 2, path: "u32" },
    })
  })
})

describe("floats", () => {
  it("writes IEEE-754 big-endian", async () => {
    expect(await toBytes(f32, 1.5)).toEqual(new Uint8Array([0x3f, 0xc0, 0, 0]))
    expect(await toBytes(f64, 1.5)).toEqual(new Uint8Array([0x3f, 0xf8, 0, 0, 0, 0, 0, 0]))
  })

  it("round-trips special values", async () => {
    expect(await fromBytes(f64, await toBytes(f64, -0.5))).toBe(-0.5)
    expect(await fromBytes(f64, await toBytes(f64, Number.NaN))).toBeNaN()
    expect(await fromBytes(f32, await toBytes(f32, Number.POSITIVE_INFINITY))).toBe(
      Number.POSITIVE_INFINITY,
    )
  })
})

describe("unit", () => {
  it("occupies no bytes", async () => {
    expect(await toBytes(unit, null)).toEqual(new Uint8Array([]))
    expect(await fromBytes(unit, new Uint8Array([]))).toBeNull()
  })
})

describe("never", () => {
  it("cannot be decoded", async () => {
    await expect(fromBytes(never, new Uint8Array([0]))).rejects.toMatchObject({
      code: "read_never",
      context: { type: "never", path: "never" },
    })
  })

  it("cannot be encoded", async () => {
    const widened: Codec<unknown> = never

    await expect(toBytes(widened, 1)).rejects.toMatchObject({ code: "invalid_value" })
  })
})
