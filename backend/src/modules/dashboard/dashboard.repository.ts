import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { loadRecords } from './recordLoader.js';
import { DatasetError, type LoadedDataset } from './dashboard.types.js';
import type { AppConfig } from '../../shared/config/appConfig.js';

type DatasetSourceConfig = Pick<AppConfig, 'dataPath' | 'dateFormats'>;

const readSource = async (filePath: string): Promise<string> => {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new DatasetError('source-missing', `Data source not found: ${filePath}`);
    }
    throw error;
  }
};

export class DashboardRepository {
  private dataset: LoadedDataset | null = null;

  constructor(private readonly config: DatasetSourceConfig) {}

  async load(): Promise<LoadedDataset> {
    if (this.dataset) {
      return this.dataset;
    }

    const text = await readSource(this.config.dataPath);
    // Strip a UTF-8 BOM so the first header name matches.
    const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
      header: false,
      skipEmptyLines: true
    });
    const [header = [], ...rows] = parsed.data;
    const { records, skippedRows } = loadRecords(header, rows, this.config.dateFormats);

    if (skippedRows > 0) {
      console.warn(`Skipped ${skippedRows} rows with an unreadable order date in ${this.config.dataPath}`);
    }
    console.log(`Loaded ${records.length} sales records from ${this.config.dataPath}`);

    this.dataset = {
      sourcePath: this.config.dataPath,
      records,
      skippedRows,
      loadedAt: new Date().toISOString()
    };
    return this.dataset;
  }
}
