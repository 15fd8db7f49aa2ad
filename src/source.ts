import * as fs from 'node:fs/promises';
import { gunzipSync } from 'node:zlib';

import fetch from 'node-fetch';

import { SOURCE_PATTERNS } from './constants.js';
import { SourceError } from './errors.js';
import type {
  CliConfig,
  FetchIndex,
  PackageRelation,
  TestMode,
} from './interfaces.js';
import { parsePackages, parseTestRepository } from './parser.js';

export function isGzipped(data: Buffer): boolean {
  const [first, second] = SOURCE_PATTERNS.GZIP_MAGIC;
  return data.length >= 2 && data[0] === first && data[1] === second;
}

export function decodeIndex(data: Buffer): string {
  if (!isGzipped(data)) {
    return data.toString('utf8');
  }
  try {
    return gunzipSync(data).toString('utf8');
  } catch (error) {
    throw new SourceError(
      `Failed to decompress index: ${(error as Error).message}`,
      error,
    );
  }
}

export async function fetchIndex(
  url: string,
  fetchImpl: FetchIndex = fetch,
): Promise<string> {
  if (SOURCE_PATTERNS.UNSUPPORTED_COMPRESSION_REGEX.test(url)) {
    throw new SourceError(
      `Unsupported index compression: '${url}' (use the .gz or plain index)`,
    );
  }

  let body: ArrayBuffer;
  try {
    const response = await fetchImpl(url);
    if (!response.ok) {
      throw new SourceError(
        `HTTP ${response.status} ${response.statusText} for ${url}`,
      );
    }
    body = await response.arrayBuffer();
  } catch (error) {
    if (error instanceof SourceError) throw error;
    throw new SourceError(
      `Failed to fetch ${url}: ${(error as Error).message}`,
      error,
    );
  }

  return decodeIndex(Buffer.from(body));
}

export async function readIndexFile(filePath: string): Promise<string> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (error) {
    throw new SourceError(
      `Failed to read ${filePath}: ${(error as Error).message}`,
      error,
    );
  }
  return decodeIndex(data);
}

export async function loadIndexText(
  config: Pick<CliConfig, 'repoUrl' | 'repoPath'>,
  fetchImpl: FetchIndex = fetch,
): Promise<string> {
  if (config.repoUrl !== undefined) {
    return fetchIndex(config.repoUrl, fetchImpl);
  }
  if (config.repoPath !== undefined) {
    return readIndexFile(config.repoPath);
  }
  throw new SourceError('No index source configured');
}

export function parseIndex(text: string, testMode: TestMode): PackageRelation {
  return testMode === 'simulate'
    ? parseTestRepository(text)
    : parsePackages(text);
}
