import { fromBytes, toBytes } from "../../wire"
import { u16, u64 } from "../integers"
import { nonZero } from "../non-zero"

describe("nonZero", () => {
  const count = nonZero(u16)

  it("writes the same bytes as its integer", async () => {
    expect(await toBytes(count, 7)).toEqual(new Uint8Array([0x00, 0x07]))
    expect(await fromBytes(count, new Uint8Array([0x00, 0x07]))).toBe(7)
  })

  it("reports a zero on the wire as an unknown variant", async () => {
    await expect(fromBytes(count, new Uint8Array([0x00, 0x00]))).rejects.toMatchObject({
      code: "unknown_variant",
      context: { type: "nonZero<u16>", value: 0 },
    })
  })

  it("refuses to encode zero", async () => {
    await expect(toBytes(count, 0)).rejects.toMatchObject({
      code: "invalid_value",
      context: { type: "nonZero<u16>" },
    })
    await expect(toBytes(nonZero(u64), 0n)).rejects.toMatchObject({ code: "invalid_value" })
  })
})
