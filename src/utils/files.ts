import * as fs from 'fs';
import * as path from 'path';

/**
 * Write a file, creating parent directories as needed.
 * Returns false when the file already held exactly this content. A given mode
 * is applied to existing files too, changed or not.
 */
export function writeFileIfChanged(filePath: string, content: string, mode?: number): boolean {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (fs.existsSync(filePath)) {
    const existing = fs.readFileSync(filePath, 'utf-8');
    if (existing === content) {
      if (mode !== undefined) fs.chmodSync(filePath, mode);
      return false;
    }
  }

  fs.writeFileSync(filePath, content, { encoding: 'utf-8', mode });
  // writeFileSync only honours mode on create
  if (mode !== undefined) fs.chmodSync(filePath, mode);
  return true;
}
