export const APP_DATA_DIR = Symbol('APP_DATA_DIR');

export const SETTINGS_FILE_NAME = 'settings.json';
export const LAST_RUN_FILE_NAME = 'last-run.json';
