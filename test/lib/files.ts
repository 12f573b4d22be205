import crypto from 'crypto';
import fs from 'fs/promises';
import * as path from 'path';

export async function createTmpDir(name: string): Promise<string> {
  const dir = path.join('.tmp', `${name}-${crypto.randomUUID()}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export async function writeTsv(dir: string, fileName: string, content: string): Promise<string> {
  const filePath = path.join(dir, fileName);
  await fs.writeFile(filePath, content);
  return filePath;
}
