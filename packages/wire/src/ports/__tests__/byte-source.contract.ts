import type { ByteSource } from "../byte-stream"

export type ByteSourceHarness = {
  name: string
  /** A source that yields exactly `bytes` and then reports the end of the stream. */
  make: (bytes: Uint8Array) => Promise<{
    source: ByteSource
    cleanup?: () => Promise<void>
  }>
}

export function describeByteSourceContract(h: ByteSourceHarness) {
  describe(`${h.name} (ByteSource contract)`, () => {
    let cleanup: (() => Promise<void>) | undefined

    async function make(bytes: number[]): Promise<ByteSource> {
      const result = await h.make(new Uint8Array(bytes))
      cleanup = result.cleanup
      return result.source
    }

    afterEach(async () => {
      await cleanup?.()
      cleanup = undefined
    })

    it("readExact() returns exactly the requested bytes in order", async () => {
      const source = await make([1, 2, 3, 4, 5])

      expect(await source.readExact(2)).toEqual(new Uint8Array([1, 2]))
      expect(await source.readExact(3)).toEqual(new Uint8Array([3, 4, 5]))
    })

    it("readExact(0) resolves with no bytes", async () => {
      const source = await make([1])

      expect(await source.readExact(0)).toEqual(new Uint8Array([]))
      expect(await source.readExact(1)).toEqual(new Uint8Array([1]))
    })

    it("readExact() fails with end_of_stream when fewer bytes are left", async () => {
      const source = await make([1, 2])

      await expect(source.readExact(4)).rejects.toMatchObject({
        code: "end_of_stream",
        context: { expected: 4, received: 2 },
      })
    })

    it("readExact() fails with end_of_stream once everything was read", async () => {
      const source = await make([9])

      await source.readExact(1)

      await expect(source.readExact(1)).rejects.toMatchObject({
        code: "end_of_stream",
        context: { expected: 1, received: 0 },
      })
    })

    it("remaining() is either unknown or the unread byte count", async () => {
      const source = await make([1, 2, 3])

      await source.readExact(1)

      const left = source.remaining?.()
      expect(left === undefined || left === 2).toBe(true)
    })
  })
}
