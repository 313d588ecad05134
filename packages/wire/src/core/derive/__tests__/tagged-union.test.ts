import type { Codec } from "../../../ports/codec"
import { bytes, f64, text, u8 } from "../../codecs"
import { CodecDefinitionError } from "../../errors"
import { fromBytes, toBytes } from "../../wire"
import { skip } from "../fields"
import { taggedUnion } from "../tagged-union"

const Toggle = taggedUnion("Toggle", { Off: {}, On: {} })

const Shape = taggedUnion("Shape", {
  Circle: { radius: f64 },
  Square: { side: f64 },
  Empty: {},
})

describe("taggedUnion", () => {
  it("writes the second payload-free variant as 0x01", async () => {
    expect(await toBytes(Toggle, { kind: "On" })).toEqual(new Uint8Array([0x01]))
  })

  it("rejects an out-of-range discriminant with its value", async () => {
    await expect(fromBytes(Toggle, new Uint8Array([0x05]))).rejects.toMatchObject({
      code: "unknown_variant",
      context: { type: "Toggle", value: 5, path: "Toggle" },
    })
  })

  it("rejects the first discriminant past the declared variants", async () => {
    await expect(fromBytes(Toggle, new Uint8Array([2]))).rejects.toMatchObject({
      code: "unknown_variant",
      context: { value: 2 },
    })
    await expect(fromBytes(Shape, new Uint8Array([3]))).rejects.toMatchObject({
      code: "unknown_variant",
      context: { value: 3 },
    })
  })

  it("writes the discriminant then the variant's fields", async () => {
    expect(await toBytes(Shape, { kind: "Circle", radius: 1.5 })).toEqual(
      new Uint8Array([0, 0x3f, 0xf8, 0, 0, 0, 0, 0, 0]),
    )
    expect(await toBytes(Shape, { kind: "Empty" })).toEqual(new Uint8Array([2]))
  })

  it("decodes into a tagged object", async () => {
    const decoded = await fromBytes(Shape, new Uint8Array([1, 0x40, 0, 0, 0, 0, 0, 0, 0]))

    expect(decoded).toEqual({ kind: "Square", side: 2 })
  })

  it("uses a custom tag property", async () => {
    const Event = taggedUnion("Event", { Start: { at: u8 }, Stop: {} }, { tag: "type" })

    expect(await toBytes(Event, { type: "Start", at: 4 })).toEqual(new Uint8Array([0, 4]))
    expect(await fromBytes(Event, new Uint8Array([1]))).toEqual({ type: "Stop" })
  })

  it("rebuilds skipped variant fields", async () => {
    const Cached = taggedUnion("Cached", { Hit: { size: u8, seen: skip((): boolean => false) } })

    expect(await toBytes(Cached, { kind: "Hit", size: 3, seen: true })).toEqual(new Uint8Array([0, 3]))
    expect(await fromBytes(Cached, new Uint8Array([0, 3]))).toEqual({ kind: "Hit", size: 3, seen: false })
  })

  it("keeps pinned discriminants stable and widens the tag to fit", async () => {
    const Msg = taggedUnion(
      "Msg",
      { Ping: {}, Data: { payload: bytes({ maxLength: 255 }) } },
      { discriminants: { Ping: 300 } },
    )

    expect(await toBytes(Msg, { kind: "Ping" })).toEqual(new Uint8Array([0x01, 0x2c]))
    expect(await toBytes(Msg, { kind: "Data", payload: new Uint8Array([7]) })).toEqual(
      new Uint8Array([0, 1, 1, 7]),
    )
    expect(await fromBytes(Msg, new Uint8Array([0x01, 0x2c]))).toEqual({ kind: "Ping" })
  })

  it("uses four bytes once a discriminant passes 0xffff", async () => {
    const Wide = taggedUnion("Wide", { A: {}, B: {} }, { discriminants: { B: 70_000 } })

    expect(await toBytes(Wide, { kind: "B" })).toEqual(new Uint8Array([0, 1, 0x11, 0x70]))
    expect(Wide.minSize).toBe(4)
  })

  it("locates failures under the variant name", async () => {
    const Labelled = taggedUnion("Labelled", { Label: { text: text({ maxLength: 2 }) } })

    await expect(toBytes(Labelled, { kind: "Label", text: "abc" })).rejects.toMatchObject({
      code: "length_exceeded",
      context: { path: "Labelled.Label.text" },
    })
  })

  it("refuses to encode an unknown variant", async () => {
    const widened: Codec<unknown> = Shape

    await expect(toBytes(widened, { kind: "Triangle" })).rejects.toMatchObject({
      code: "invalid_value",
      context: { type: "Shape" },
    })
  })

  it("cannot decode a union without variants", async () => {
    const Void = taggedUnion("Void", {})

    expect(Void.minSize).toBe(0)
    await expect(fromBytes(Void, new Uint8Array([0]))).rejects.toMatchObject({
      code: "read_never",
      context: { path: "Void" },
    })
  })

  describe("definition errors", () => {
    it("refuses duplicate discriminants", () => {
      expect(() => taggedUnion("Dup", { A: {}, B: {} }, { discriminants: { A: 1 } })).toThrow(
        CodecDefinitionError,
      )
    })

    it("refuses negative, fractional and too large discriminants", () => {
      expect(() => taggedUnion("N", { A: {} }, { discriminants: { A: -1 } })).toThrow(CodecDefinitionError)
      expect(() => taggedUnion("F", { A: {} }, { discriminants: { A: 1.5 } })).toThrow(CodecDefinitionError)
      expect(() => taggedUnion("L", { A: {} }, { discriminants: { A: 2 ** 32 } })).toThrow(
        CodecDefinitionError,
      )
    })

    it("refuses a field named like the tag", () => {
      expect(() => taggedUnion("Clash", { A: { kind: u8 } })).toThrow(/named like the tag/)
    })

    it("refuses variant names that would reorder the declaration", () => {
      expect(() => taggedUnion("Numbered", { B: {}, "1": { x: u8 } })).toThrow(CodecDefinitionError)
      expect(() => taggedUnion("Numbered", { B: {}, "1": { x: u8 } })).toThrow(
        'variant "1" looks like an array index',
      )
    })
  })
})
