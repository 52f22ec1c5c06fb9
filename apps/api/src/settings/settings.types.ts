export const UI_THEMES = ['dark', 'light'] as const;
export type UiTheme = (typeof UI_THEMES)[number];

export type Settings = {
  radarrUrl: string;
  radarrApiKey: string;
  /** Set only by a successful connection test; cleared when URL or key change. */
  radarrOk: boolean;
  tagLabel: string;
  daysOld: number;
  dryRun: boolean;
  deleteFiles: boolean;
  addImportExclusion: boolean;
  httpTimeoutSeconds: number;
  cronSchedule: string;
  runOnStartup: boolean;
  uiTheme: UiTheme;
};

export type SettingsKey = keyof Settings;

export type PublicSettings = Omit<Settings, 'radarrApiKey'> & {
  radarrApiKeySet: boolean;
};

export type SettingsIntent = 'save' | 'run';

export type SettingsChange = {
  previous: Readonly<Settings>;
  next: Readonly<Settings>;
  changed: SettingsKey[];
};
