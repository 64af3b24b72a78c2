export { SettingsDao, DEFAULT_SETTINGS } from './SettingsDao'
export { TaskDao, MAX_RECENT_TASKS } from './TaskDao'
