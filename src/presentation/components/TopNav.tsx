export type View = 'inventory' | 'settings'

interface TopNavProps {
  current: View
  onChange: (view: View) => void
}

const TABS: { view: View; label: string }[] = [
  { view: 'inventory', label: 'Inventory' },
  { view: 'settings', label: 'Settings' },
]

export function TopNav({ current, onChange }: TopNavProps) {
  return (
    <nav className="top-nav">
      <span className="top-nav-brand">Stockroom</span>
      {TABS.map((tab) => (
        <button
          key={tab.view}
          className={`top-nav-tab${current === tab.view ? ' active' : ''}`}
          onClick={() => onChange(tab.view)}
        >
          {tab.label}
        </button>
      ))}
    </nav>
  )
}
