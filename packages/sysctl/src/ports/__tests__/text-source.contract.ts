import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { TextSource } from "../text-source"

export type TextSourceHarness = {
  name: string
  /** Whether read() can be called again with the same result. */
  rereadable: boolean
  setup: (cwd: string, text: string) => Promise<void>
  make: (cwd: string, text: string) => TextSource
}

const SAMPLE = "# kernel tuning\nkernel.pid_max = 4194304\nnet.ipv4.ip_forward = 1\n"

export function describeTextSourceContract(h: TextSourceHarness) {
  describe(`${h.name} (TextSource contract)`, () => {
    let cwd: string
    let source: TextSource

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "text-source-test-"))
      await h.setup(cwd, SAMPLE)
      source = h.make(cwd, SAMPLE)
    })

    afterEach(async () => {
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("read() resolves to the complete text", async () => {
      await expect(source.read()).resolves.toBe(SAMPLE)
    })

    if (h.rereadable) {
      it("read() is idempotent", async () => {
        const a = await source.read()
        const b = await source.read()

        expect(b).toBe(a)
      })
    }
  })
}
