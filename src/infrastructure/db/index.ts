export { openDatabase, migrate, type StockroomDB } from './database.ts'
export { createItemRepository } from './itemRepository.ts'
export { createSettingsRepository } from './settingsRepository.ts'
export { createMappingRepository } from './mappingRepository.ts'
