export {
  SettingsApp,
  noteModel,
  settingsModel,
  type Note,
  type NoteFilter,
  type Settings,
  type SettingsAppOptions,
  type Theme,
} from './app.js';
