interface PaginationProps {
  page: number
  totalPages: number
  hasPrev: boolean
  hasNext: boolean
  onChange: (page: number) => void
}

export function Pagination({ page, totalPages, hasPrev, hasNext, onChange }: PaginationProps) {
  if (totalPages <= 1) return null
  return (
    <div className="pagination">
      <button disabled={!hasPrev} onClick={() => onChange(page - 1)}>Previous</button>
      <span>Page {page} of {totalPages}</span>
      <button disabled={!hasNext} onClick={() => onChange(page + 1)}>Next</button>
    </div>
  )
}
