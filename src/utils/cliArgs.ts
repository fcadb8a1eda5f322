/**
 * Command-line argument parsing
 *
 * Usage:
 *   watermark-locator <file-or-url> [--export out.xlsx|out.csv]
 *                     [--merge 1,2]... [--split 3@12.5]... [--work-dir dir]
 */

import { InvalidArgumentError } from './errors.js';
import type { ClipEdit } from '../services/pipeline.js';

export interface CliArgs {
  source: string;
  exportPath: string | null;
  workDir: string | null;
  edits: ClipEdit[];
  help: boolean;
}

export const USAGE = `Usage: watermark-locator <file-or-url> [options]

Options:
  --export <path>        Write detections to .csv or .xlsx
  --merge <id,id,...>    Merge clips (ascending ids), repeatable
  --split <id>@<secs>    Split a clip at a time in seconds, repeatable
  --work-dir <dir>       Directory for trimmed clips and downloads
  -h, --help             Show this message`;

function parseIdList(value: string): number[] {
  const parts = value.split(',').map((part) => part.trim());
  const ids = parts.map(Number);
  if (parts.some((part) => part === '') || ids.some((id) => !Number.isInteger(id))) {
    throw new InvalidArgumentError(`--merge expects comma-separated clip ids (got "${value}")`);
  }
  return ids;
}

function parseSplit(value: string): ClipEdit {
  const match = /^(\d+)@(\d+(?:\.\d+)?)$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError(`--split expects <id>@<seconds> (got "${value}")`);
  }
  return { type: 'split', clipId: Number(match[1]), splitTime: Number(match[2]) };
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { source: '', exportPath: null, workDir: null, edits: [], help: false };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = (): string => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new InvalidArgumentError(`${arg} requires a value`);
      }
      i++;
      return value;
    };

    switch (arg) {
      case '-h':
      case '--help':
        result.help = true;
        break;
      case '--export':
        result.exportPath = next();
        break;
      case '--work-dir':
        result.workDir = next();
        break;
      case '--merge':
        result.edits.push({ type: 'merge', clipIds: parseIdList(next()) });
        break;
      case '--split':
        result.edits.push(parseSplit(next()));
        break;
      default:
        if (arg.startsWith('--')) {
          throw new InvalidArgumentError(`Unknown option ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (result.help) return result;
  if (positional.length !== 1) {
    throw new InvalidArgumentError('Expected exactly one video file or URL');
  }
  result.source = positional[0];
  return result;
}
