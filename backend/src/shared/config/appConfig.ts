import path from 'node:path';

export interface AppConfig {
  port: number;
  dataPath: string;
  topStates: number;
  dateFormats: readonly string[];
}

type Env = Record<string, string | undefined>;

export const DEFAULT_TOP_STATES = 15;

// Month-first formats come before day-first ones, so 3/4/2022 reads as March 4.
export const DEFAULT_DATE_FORMATS: readonly string[] = ['M/d/yyyy', 'd/M/yyyy', 'yyyy-MM-dd', 'd-M-yyyy', 'M-d-yyyy', 'yyyy/M/d'];

const readPositiveInteger = (value: string | undefined, fallback: number) => {
  if (!value?.trim()) {
    return fallback;
  }
  const parsed = Number(value.trim());
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const readList = (value: string | undefined, fallback: readonly string[]) => {
  const items = (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : [...fallback];
};

export const loadAppConfig = (env: Env = process.env, cwd: string = process.cwd()): AppConfig => {
  const dataPath = env.DASHBOARD_DATA_PATH?.trim() || path.join('data', 'orders.csv');

  return Object.freeze({
    port: readPositiveInteger(env.PORT, 4000),
    dataPath: path.resolve(cwd, dataPath),
    topStates: readPositiveInteger(env.DASHBOARD_TOP_STATES, DEFAULT_TOP_STATES),
    dateFormats: Object.freeze(readList(env.DASHBOARD_DATE_FORMATS, DEFAULT_DATE_FORMATS))
  });
};

export const appConfig = loadAppConfig();
