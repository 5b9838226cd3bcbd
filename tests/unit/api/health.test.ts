import { describe, expect, it } from 'vitest'
import handler from '../../../api/health.ts'
import { call } from '../../helpers/vercel.ts'

describe('GET /api/health', () => {
  it('answers with ok and the current time', async () => {
    const res = await call(handler, { method: 'GET' })

    expect(res.statusCode).toBe(200)
    expect(res.body).toMatchObject({ ok: true, time: expect.any(String) })
  })
})
