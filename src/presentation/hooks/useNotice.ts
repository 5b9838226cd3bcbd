import { useState, useCallback, useEffect } from 'react'
import type { ApiResult, ResultStatus } from '@infrastructure/api/stockroomApi.ts'

export interface Notice {
  status: ResultStatus
  message: string
}

function isResultStatus(value: string | null): value is ResultStatus {
  return value === 'success' || value === 'error' || value === 'partial'
}

/** Outcome a form post was redirected with (`?status=...&message=...`), if any */
export function readFlash(search: string): Notice | null {
  const params = new URLSearchParams(search)
  const status = params.get('status')
  const message = params.get('message')
  if (!isResultStatus(status) || !message) return null
  return { status, message }
}

/** Flash message for the last action, plus a runner that fills it in */
export function useNotice(onDone: () => Promise<void>) {
  const [notice, setNotice] = useState<Notice | null>(null)

  useEffect(() => {
    const flash = readFlash(window.location.search)
    if (!flash) return
    setNotice(flash)
    window.history.replaceState(null, '', window.location.pathname)
  }, [])

  const run = useCallback(async (action: () => Promise<ApiResult>): Promise<boolean> => {
    try {
      const result = await action()
      setNotice({ status: result.status, message: result.message })
      await onDone()
      return result.status !== 'error'
    } catch (err) {
      setNotice({ status: 'error', message: err instanceof Error ? err.message : 'Unknown error' })
      return false
    }
  }, [onDone])

  const dismiss = useCallback(() => setNotice(null), [])

  return { notice, setNotice, run, dismiss }
}
