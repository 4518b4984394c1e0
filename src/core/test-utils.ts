/**
 * Test utilities for the install pipeline: in-memory archives, a fake release index and a fake fetch.
 */

import archiver from 'archiver';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import * as tar from 'tar';
import type { ReleaseRecord } from '../types/release';
import type { FetchFn } from './http-transport';
import type { ReleaseIndex } from './release-index';

export interface TestEntry {
  content: string;
  mode?: number;
}

export interface TestSymlink {
  symlink: string;
}

/**
 * Create a zip archive in memory.
 *
 * @example
 * const data = await createTestZip({
 *   'bin/tool': { content: '#!/bin/sh', mode: 0o755 },
 *   'tool': { symlink: 'bin/tool' },
 * });
 */
export function createTestZip(files: Record<string, string | TestEntry | TestSymlink>): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const archive = archiver('zip', { zlib: { level: 9 } });
    const chunks: Buffer[] = [];

    archive.on('data', (chunk: Buffer) => chunks.push(chunk));
    archive.on('end', () => resolve(Buffer.concat(chunks)));
    archive.on('error', reject);

    for (const [name, entry] of Object.entries(files)) {
      if (typeof entry === 'string') {
        archive.append(entry, { name });
      } else if ('symlink' in entry) {
        archive.symlink(name, entry.symlink);
      } else {
        archive.append(entry.content, { name, mode: entry.mode });
      }
    }

    archive.finalize().catch(reject);
  });
}

/**
 * Create a gzip-compressed tarball in memory by packing a temporary directory.
 */
export async function createTestTarGz(files: Record<string, string>): Promise<Buffer> {
  const sourceDir = await fs.mkdtemp(path.join(os.tmpdir(), 'engman-tar-src-'));
  const tarballPath = path.join(os.tmpdir(), `${path.basename(sourceDir)}.tar.gz`);

  try {
    for (const [name, content] of Object.entries(files)) {
      await fs.outputFile(path.join(sourceDir, name), content);
    }
    await tar.c({ gzip: true, file: tarballPath, cwd: sourceDir }, Object.keys(files));
    return await fs.readFile(tarballPath);
  } finally {
    await fs.remove(sourceDir);
    await fs.remove(tarballPath);
  }
}

export async function createTempDir(prefix = 'engman-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Release index backed by a fixed list of releases.
 */
export class FakeReleaseIndex implements ReleaseIndex {
  readonly lookups: string[] = [];

  constructor(private readonly releases: ReleaseRecord[]) {}

  async getRelease(tagName: string): Promise<ReleaseRecord | null> {
    this.lookups.push(tagName);
    return this.releases.find(release => release.tagName === tagName) ?? null;
  }

  async listReleases(): Promise<ReleaseRecord[]> {
    return this.releases;
  }
}

/**
 * fetch stand-in serving fixed bodies by URL and recording every request.
 */
export function createFakeFetch(routes: Record<string, Buffer | string>): { fetch: FetchFn; requests: string[] } {
  const requests: string[] = [];

  const fetch: FetchFn = async (url) => {
    requests.push(url);
    const body = routes[url];
    if (body === undefined) {
      return new Response('Not Found', { status: 404, statusText: 'Not Found' });
    }
    const bytes = typeof body === 'string' ? Buffer.from(body) : body;
    return new Response(new Uint8Array(bytes), {
      status: 200,
      headers: { 'content-length': String(bytes.length) },
    });
  };

  return { fetch, requests };
}

/**
 * Flip the bytes in [start, end) so the compressed data no longer inflates.
 */
export function damage(data: Buffer, start: number, end: number): Buffer {
  const copy = Buffer.from(data);
  for (let i = start; i < Math.min(end, copy.length); i++) {
    copy[i] ^= 0xff;
  }
  return copy;
}

/**
 * Text that deflates into a few kilobytes, so damage lands in compressed data.
 */
export function engineLikeContent(lines = 2000): string {
  return Array.from({ length: lines }, (_, i) => `entry ${i} ${(i * i) % 977} ${(i * 7919) % 104729}`).join('\n');
}
