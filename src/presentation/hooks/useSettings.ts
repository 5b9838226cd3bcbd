import { useState, useEffect, useCallback } from 'react'
import * as api from '@infrastructure/api/stockroomApi.ts'
import type { CategoryTaskMapping, DefaultTaskList } from '@domain/models/CategoryTaskMapping.ts'
import { useNotice } from './useNotice.ts'

export function useSettings() {
  const [settings, setSettings] = useState<api.SettingsOverview | null>(null)
  const [loading, setLoading] = useState(true)

  const reload = useCallback(async () => {
    try {
      setSettings(await api.fetchSettings())
    } finally {
      setLoading(false)
    }
  }, [])

  const { notice, setNotice, run, dismiss } = useNotice(reload)

  useEffect(() => {
    reload().catch((err: unknown) => {
      setNotice({ status: 'error', message: err instanceof Error ? err.message : 'Unknown error' })
    })
  }, [reload, setNotice])

  // The OAuth callback lands here with ?connected=1 or ?oauth_error=...
  useEffect(() => {
    const params = new URLSearchParams(window.location.search)
    const oauthError = params.get('oauth_error')
    if (params.has('connected')) {
      setNotice({ status: 'success', message: 'Connected to Google Tasks' })
    } else if (oauthError) {
      setNotice({ status: 'error', message: `Could not connect: ${oauthError}` })
    } else {
      return
    }
    window.history.replaceState(null, '', window.location.pathname)
  }, [setNotice])

  const connect = useCallback(() => {
    window.location.href = api.getAuthorizeUrl()
  }, [])

  return {
    settings,
    loading,
    notice,
    dismissNotice: dismiss,
    connect,
    disconnect: useCallback(() => run(api.disconnect), [run]),
    saveCredentials: useCallback(
      (clientId: string, clientSecret: string) => run(() => api.saveCredentials(clientId, clientSecret)),
      [run],
    ),
    removeCredentials: useCallback(() => run(api.removeCredentials), [run]),
    setDefaultTaskList: useCallback((list: DefaultTaskList) => run(() => api.setDefaultTaskList(list)), [run]),
    saveMapping: useCallback(
      (mapping: Omit<CategoryTaskMapping, 'id'>) => run(() => api.saveMapping(mapping)),
      [run],
    ),
    deleteMapping: useCallback((id: number) => run(() => api.deleteMapping(id)), [run]),
  }
}
