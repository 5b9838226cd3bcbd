export interface CategoryTaskMapping {
  id: number
  category: string
  tasklistId: string
  tasklistName: string
}

/** Target list for items whose category has no mapping of its own */
export interface DefaultTaskList {
  tasklistId: string
  tasklistName: string
}
