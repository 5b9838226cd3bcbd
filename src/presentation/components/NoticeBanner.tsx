import type { Notice } from '@presentation/hooks/useNotice.ts'

interface NoticeBannerProps {
  notice: Notice | null
  onDismiss: () => void
}

export function NoticeBanner({ notice, onDismiss }: NoticeBannerProps) {
  if (!notice) return null
  return (
    <div className={`notice notice-${notice.status}`} role="status">
      <span>{notice.message}</span>
      <button className="notice-dismiss" onClick={onDismiss} aria-label="Dismiss">
        ×
      </button>
    </div>
  )
}
