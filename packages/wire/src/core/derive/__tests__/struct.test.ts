import type { Codec, Infer } from "../../../ports/codec"
import { bool, list, optional, text, u16, u64, u8 } from "../../codecs"
import { CodecDefinitionError } from "../../errors"
import { fromBytes, toBytes } from "../../wire"
import { skip } from "../fields"
import { struct } from "../struct"

const Item = struct("Item", {
  name: text({ maxLength: 255 }),
  qty: u16,
})

const Order = struct("Order", {
  id: u64,
  items: list(Item),
  note: optional(text()),
  cachedTotal: skip(() => 0),
})

type Order = Infer<typeof Order>

const order: Order = {
  id: 1n,
  items: [{ name: "ab", qty: 3 }],
  note: undefined,
  cachedTotal: 99,
}

const orderBytes = new Uint8Array([
  0, 0, 0, 0, 0, 0, 0, 1, // id
  0, 0, 0, 0, 0, 0, 0, 1, // items length
  2, 0x61, 0x62, // items[0].name
  0, 3, // items[0].qty
  0, // note
])

describe("struct", () => {
  it("writes fields in declaration order with no names on the wire", async () => {
    expect(await toBytes(Order, order)).toEqual(orderBytes)
  })

  it("rebuilds skipped fields from their default", async () => {
    expect(await fromBytes(Order, orderBytes)).toEqual({ ...order, cachedTotal: 0 })
  })

  it("follows declaration order, not value order", async () => {
    const Point = struct("Point", { y: u8, x: u8 })

    expect(await toBytes(Point, { x: 1, y: 2 })).toEqual(new Uint8Array([2, 1]))
  })

  it("sums the sizes of written fields for its lower bound", () => {
    expect(Order.minSize).toBe(8 + 8 + 1)
    expect(Item.minSize).toBe(1 + 2)
  })

  it("locates a decode failure by field and index", async () => {
    const Flags = struct("Flags", { on: bool })
    const Holder = struct("Holder", { flags: list(Flags) })

    await expect(
      fromBytes(Holder, new Uint8Array([0, 0, 0, 0, 0, 0, 0, 2, 1, 9])),
    ).rejects.toMatchObject({
      code: "invalid_bool",
      context: { byte: 9, path: "Holder.flags[1].on" },
    })
  })

  it("locates an encode failure by field and index", async () => {
    const bad = { ...order, items: [{ name: "ok", qty: 1 }, { name: "x", qty: 70_000 }] }

    await expect(toBytes(Order, bad)).rejects.toMatchObject({
      code: "invalid_value",
      context: { path: "Order.items[1].qty" },
    })
  })

  it("stops at the first failing field", async () => {
    const Pair = struct("Pair", { first: bool, second: bool })

    await expect(fromBytes(Pair, new Uint8Array([5]))).rejects.toMatchObject({
      code: "invalid_bool",
      context: { path: "Pair.first" },
    })
  })

  it("refuses values that are not objects", async () => {
    const widened: Codec<unknown> = Item

    await expect(toBytes(widened, 5)).rejects.toMatchObject({
      code: "invalid_value",
      context: { type: "Item" },
    })
  })

  it("supports generic composites", async () => {
    const pairOf = <A>(codec: Codec<A>) => struct(`Pair<${codec.name}>`, { left: codec, right: codec })
    const Pair = pairOf(u8)

    expect(Pair.name).toBe("Pair<u8>")
    expect(await fromBytes(Pair, await toBytes(Pair, { left: 1, right: 2 }))).toEqual({
      left: 1,
      right: 2,
    })
  })

  it("refuses field names that look like array indexes", () => {
    expect(() => struct("Bad", { name: u8, "1": u8 })).toThrow(CodecDefinitionError)
  })

  it("requires a name", () => {
    expect(() => struct("", { a: u8 })).toThrow(CodecDefinitionError)
  })
})
