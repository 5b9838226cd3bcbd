import { useState } from 'react'
import { useSettings } from '@presentation/hooks/useSettings.ts'
import { MappingTable } from '@presentation/components/MappingTable.tsx'
import { NoticeBanner } from '@presentation/components/NoticeBanner.tsx'

export function SettingsPage() {
  const s = useSettings()
  const [clientId, setClientId] = useState('')
  const [clientSecret, setClientSecret] = useState('')

  const handleCredentials = async (e: React.FormEvent) => {
    e.preventDefault()
    if (await s.saveCredentials(clientId, clientSecret)) {
      setClientId('')
      setClientSecret('')
    }
  }

  const handleDefaultList = (tasklistId: string) => {
    const list = s.settings?.tasklists.find((t) => t.id === tasklistId)
    if (list) void s.setDefaultTaskList({ tasklistId: list.id, tasklistName: list.title })
  }

  const settings = s.settings

  return (
    <main className="page settings-page">
      <h1>Settings</h1>
      <NoticeBanner notice={s.notice} onDismiss={s.dismissNotice} />

      {s.loading && <p className="loading">Loading...</p>}
      {settings?.error && <p className="error">{settings.error}</p>}

      {settings && (
        <>
          <section>
            <h2>Google OAuth client</h2>
            {settings.configured ? (
              <p>
                Client credentials are saved.{' '}
                <button className="danger" onClick={() => void s.removeCredentials()}>Remove credentials</button>
              </p>
            ) : (
              <form className="credentials-form" onSubmit={(e) => void handleCredentials(e)}>
                <input placeholder="Client ID" value={clientId} onChange={(e) => setClientId(e.target.value)} required />
                <input
                  placeholder="Client secret"
                  type="password"
                  value={clientSecret}
                  onChange={(e) => setClientSecret(e.target.value)}
                  required
                />
                <button type="submit">Save credentials</button>
              </form>
            )}
          </section>

          {settings.configured && (
            <section>
              <h2>Google Tasks</h2>
              {settings.authenticated ? (
                <p>
                  Connected.{' '}
                  <button className="secondary" onClick={() => void s.disconnect()}>Disconnect</button>
                </p>
              ) : (
                <button onClick={s.connect}>Connect Google Tasks</button>
              )}
            </section>
          )}

          {settings.authenticated && (
            <>
              <section>
                <h2>Default task list</h2>
                <select
                  value={settings.defaultTasklist?.tasklistId ?? ''}
                  onChange={(e) => handleDefaultList(e.target.value)}
                >
                  <option value="">Choose a list...</option>
                  {settings.tasklists.map((t) => (
                    <option key={t.id} value={t.id}>{t.title}</option>
                  ))}
                </select>
              </section>

              <section>
                <h2>Category mappings</h2>
                <MappingTable
                  mappings={settings.mappings}
                  categories={settings.categories}
                  tasklists={settings.tasklists}
                  onSave={s.saveMapping}
                  onDelete={s.deleteMapping}
                />
              </section>
            </>
          )}
        </>
      )}
    </main>
  )
}
