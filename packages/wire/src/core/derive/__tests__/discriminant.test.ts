import { MemoryByteSink } from "../../../adapters/memory/memory-byte-sink"
import { CodecDefinitionError } from "../../errors"
import { StreamWireWriter } from "../../io"
import { discriminantWidth, resolveDiscriminants, writeDiscriminant } from "../discriminant"

describe("resolveDiscriminants", () => {
  it("numbers variants by declaration order", () => {
    const table = resolveDiscriminants("T", ["A", "B", "C"])

    expect([...table.byName]).toEqual([
      ["A", 0],
      ["B", 1],
      ["C", 2],
    ])
    expect(table.byValue.get(2)).toBe("C")
    expect(table.width).toBe(1)
  })

  it("lets pins replace the implicit index", () => {
    const table = resolveDiscriminants("T", ["A", "B"], { A: 7 })

    expect(table.byName.get("A")).toBe(7)
    expect(table.byName.get("B")).toBe(1)
  })

  it("refuses pins for unknown variants", () => {
    expect(() => resolveDiscriminants("T", ["A"], { Z: 4 })).toThrow(/unknown variant "Z"/)
  })

  it("reports which variants collide", () => {
    expect(() => resolveDiscriminants("T", ["A", "B"], { B: 0 })).toThrow(
      new CodecDefinitionError('invalid codec definition for T: variants "A" and "B" share discriminant 0', {
        code: "invalid_definition",
      }),
    )
  })
})

describe("discriminantWidth", () => {
  it("picks the narrowest of one, two or four bytes", () => {
    expect(discriminantWidth(0)).toBe(1)
    expect(discriminantWidth(0xff)).toBe(1)
    expect(discriminantWidth(0x100)).toBe(2)
    expect(discriminantWidth(0xffff)).toBe(2)
    expect(discriminantWidth(0x10000)).toBe(4)
  })
})

describe("writeDiscriminant", () => {
  it("writes big-endian at the table's width", async () => {
    const sink = new MemoryByteSink()
    const table = resolveDiscriminants("T", ["A", "B"], { B: 0x1234 })

    await writeDiscriminant(new StreamWireWriter(sink), table, 0x1234)

    expect(sink.toBytes()).toEqual(new Uint8Array([0x12, 0x34]))
  })
})
