/**
 * Generated secrets, stored as a dotenv file next to the stack config.
 *
 * Writing the file belongs to the init tooling; this side only reads it.
 */

import dotenv from 'dotenv';
import type { CommandRunner } from './runner.js';

export async function loadSecrets(
  runner: CommandRunner,
  path: string,
): Promise<Record<string, string>> {
  const content = await runner.readFile(path);
  if (content === null) return {};
  return dotenv.parse(content);
}
