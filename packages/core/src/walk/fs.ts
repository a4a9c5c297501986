import fs from 'node:fs/promises';
import type { BigIntStats } from 'node:fs';

/**
 * Directory and stat access used by the walker. Tests substitute this to simulate a
 * filesystem that reports directory entries in a different order.
 */
export interface WalkFs {
  readdir(dir: string): Promise<string[]>;
  lstat(filePath: string): Promise<BigIntStats>;
  stat(filePath: string): Promise<BigIntStats>;
  realpath(filePath: string): Promise<string>;
}

export const nodeWalkFs: WalkFs = {
  readdir: (dir) => fs.readdir(dir),
  lstat: (filePath) => fs.lstat(filePath, { bigint: true }),
  stat: (filePath) => fs.stat(filePath, { bigint: true }),
  realpath: (filePath) => fs.realpath(filePath)
};
