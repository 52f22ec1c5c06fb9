export const APP_NAME = 'reaparr';
export const DEFAULT_APP_VERSION = '1.0.0';

export type AppMeta = {
  name: string;
  version: string;
  buildSha: string | null;
  buildTime: string | null;
};

export function readAppMeta(env: NodeJS.ProcessEnv = process.env): AppMeta {
  return {
    name: APP_NAME,
    version: env.APP_VERSION?.trim() || DEFAULT_APP_VERSION,
    buildSha: env.APP_BUILD_SHA?.trim() || null,
    buildTime: env.APP_BUILD_TIME?.trim() || null,
  };
}
