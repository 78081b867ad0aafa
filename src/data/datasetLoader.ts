import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { randomUUID } from 'crypto';
import type { Stats } from 'fs';
import { mkdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { Dataset } from '../types';
import { BadInputError, UpstreamError, errorMessage, fromFsError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { csvToDataset } from './csv';
import { readFirstTable } from './sqlite';

const logger = createLogger('DatasetLoader');

export const SQLITE_EXTENSIONS = ['.sqlite', '.sqlite3', '.db', '.s3db', '.sl3'];
export const SUPPORTED_EXTENSIONS = ['.csv', ...SQLITE_EXTENSIONS];

const URL_PATTERN = /^https?:\/\//i;

export interface DatasetLoaderOptions {
  stagingDir: string;
  http?: AxiosInstance;
  timeoutMs?: number;
}

/**
 * Turns a path, URL or uploaded payload into the canonical Dataset.
 */
export class DatasetLoader {
  private readonly stagingDir: string;
  private readonly http: AxiosInstance;

  constructor(options: DatasetLoaderOptions) {
    this.stagingDir = options.stagingDir;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 60000 });
  }

  async load(source: string, signal?: AbortSignal): Promise<Dataset> {
    const trimmed = source.trim();
    if (URL_PATTERN.test(trimmed)) {
      return this.loadUrl(trimmed, signal);
    }
    return this.loadFile(trimmed);
  }

  async loadFile(filePath: string): Promise<Dataset> {
    let stats: Stats;
    try {
      stats = await stat(filePath);
    } catch (error) {
      throw fromFsError(error, filePath);
    }
    if (!stats.isFile()) {
      throw new BadInputError(`Path is not a file: ${filePath}`);
    }

    const extension = extname(filePath).toLowerCase();
    if (extension === '.csv') {
      let text: string;
      try {
        text = await readFile(filePath, 'utf-8');
      } catch (error) {
        throw fromFsError(error, filePath);
      }
      return csvToDataset(text);
    }

    if (SQLITE_EXTENSIONS.includes(extension)) {
      const { table, dataset } = readFirstTable(filePath);
      logger.debug(`Loaded table ${table} from ${filePath}`);
      return dataset;
    }

    throw new BadInputError(`Unsupported file format. Supported: ${SUPPORTED_EXTENSIONS.join(', ')}`);
  }

  async loadUrl(url: string, signal?: AbortSignal): Promise<Dataset> {
    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        signal,
        validateStatus: () => true,
      });
    } catch (error) {
      if (axios.isCancel(error)) {
        throw error;
      }
      throw new UpstreamError(`Failed to download file: ${url}: ${errorMessage(error)}`, 502, '');
    }

    const bytes = new Uint8Array(response.data);
    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamError(
        `Failed to download file: ${url}`,
        response.status,
        Buffer.from(bytes).toString('utf-8')
      );
    }

    const pathname = URL.canParse(url) ? new URL(url).pathname : url;
    return this.loadStaged(extname(pathname).toLowerCase(), bytes);
  }

  async loadUpload(filename: string, bytes: Uint8Array): Promise<Dataset> {
    return this.loadStaged(extname(basename(filename)).toLowerCase(), bytes);
  }

  private async loadStaged(extension: string, bytes: Uint8Array): Promise<Dataset> {
    await mkdir(this.stagingDir, { recursive: true });
    const stagingPath = join(this.stagingDir, `staging-${randomUUID()}${extension}`);
    try {
      await writeFile(stagingPath, bytes);
      return await this.loadFile(stagingPath);
    } finally {
      await rm(stagingPath, { force: true });
    }
  }
}
