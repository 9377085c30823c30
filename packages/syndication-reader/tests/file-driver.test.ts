import { stat } from "node:fs/promises"
import { afterEach, describe, expect, it, vi } from "vitest"
import { FileDriver } from "../src/drivers/file"

vi.mock(`node:fs/promises`, () => ({
  stat: vi.fn(),
  readFile: vi.fn(),
}))

function fsError(code: string): Error {
  return Object.assign(new Error(`${code}: operation not permitted`), { code })
}

describe(`FileDriver permissions`, () => {
  afterEach(() => {
    vi.mocked(stat).mockReset()
  })

  it.each([`EACCES`, `EPERM`])(`should answer 403 on %s`, async (code) => {
    vi.mocked(stat).mockRejectedValueOnce(fsError(code))

    const response = await new FileDriver().getResponse(
      `/srv/feeds/private.xml`,
      new Date(0)
    )

    expect(response).toEqual({
      statusCode: 403,
      body: ``,
      message: `Forbidden`,
    })
  })
})
