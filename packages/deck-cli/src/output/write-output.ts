/**
 * Output document writing
 */

import fs from 'fs-extra';
import path from 'node:path';
import { createDeckError, describeCause } from '@deckwright/core';

/**
 * Write the document through a sibling temp file and rename it into place.
 * On failure the previous file at `filePath`, if any, is untouched.
 */
export async function writeOutputFile(filePath: string, content: string): Promise<void> {
  const target = path.resolve(filePath);
  const tmp = `${target}.${process.pid}.tmp`;

  try {
    await fs.ensureDir(path.dirname(target));
    await fs.writeFile(tmp, content, 'utf8');
    await fs.rename(tmp, target);
  } catch (error) {
    await fs.remove(tmp);
    throw createDeckError('DECK_WRITE_ERROR', `Cannot write ${target}: ${describeCause(error)}`, {
      path: target,
    });
  }
}
