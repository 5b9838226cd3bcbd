import { useState, useEffect, useCallback } from 'react'
import { InventoryPage } from '@presentation/pages/InventoryPage.tsx'
import { SettingsPage } from '@presentation/pages/SettingsPage.tsx'
import { TopNav, type View } from '@presentation/components/TopNav.tsx'

const PATHS: Record<View, string> = { inventory: '/', settings: '/settings' }

// Form posts and the OAuth callback redirect to /settings, so the view follows the URL
function viewFromPath(pathname: string): View {
  return pathname.startsWith('/settings') ? 'settings' : 'inventory'
}

function App() {
  const [view, setView] = useState<View>(() => viewFromPath(window.location.pathname))

  useEffect(() => {
    const onPopState = () => setView(viewFromPath(window.location.pathname))
    window.addEventListener('popstate', onPopState)
    return () => window.removeEventListener('popstate', onPopState)
  }, [])

  const navigate = useCallback((next: View) => {
    window.history.pushState(null, '', PATHS[next])
    setView(next)
  }, [])

  return (
    <>
      <TopNav current={view} onChange={navigate} />
      {view === 'inventory' ? <InventoryPage /> : <SettingsPage />}
    </>
  )
}

export default App
