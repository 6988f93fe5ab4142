import fs from 'fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { isLogLevel, type LogLevel } from '../pipeline/log';

/*
 * logs.ts - print (and optionally follow) a run log written via LOG_FILE,
 * keeping only lines at or above --level.
 */
const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function lineLevel(line: string): LogLevel | null {
  try {
    const obj: unknown = JSON.parse(line);
    if (typeof obj === 'object' && obj !== null && 'level' in obj) {
      const level = String(obj.level);
      return isLogLevel(level) ? level : null;
    }
  } catch {
    // not JSON: printed as-is
  }
  return null;
}

function tailFile(file: string, printChunk: (s: string) => void) {
  let size = fs.statSync(file).size;
  let pending = '';
  setInterval(() => {
    const stat = fs.statSync(file);
    if (stat.size <= size) return;
    const fd = fs.openSync(file, 'r');
    const buf = Buffer.alloc(stat.size - size);
    fs.readSync(fd, buf, 0, buf.length, size);
    fs.closeSync(fd);
    size = stat.size;
    const lines = (pending + buf.toString('utf8')).split(/\r?\n/);
    pending = lines.pop() ?? '';
    lines.forEach(printChunk);
  }, 1500);
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('file', { type: 'string', default: ENV.logFile, describe: 'Log file (default: LOG_FILE)' })
    .option('level', { type: 'string', default: 'debug', describe: 'Min level filter (debug|info|warn|error)' })
    .option('follow', { type: 'boolean', default: false, describe: 'Stream appended lines' })
    .parse();

  const file = argv.file;
  if (!file) {
    console.error('No log file: pass --file or set LOG_FILE');
    process.exit(1);
  }
  if (!fs.existsSync(file)) {
    console.error('Log file does not exist:', file);
    process.exit(1);
  }
  const min = isLogLevel(argv.level) ? ORDER[argv.level] : ORDER.debug;

  const printLine = (raw: string) => {
    const line = raw.trim();
    if (!line) return;
    const level = lineLevel(line);
    if (level === null || ORDER[level] >= min) {
      process.stdout.write(line + '\n');
    }
  };

  fs.readFileSync(file, 'utf8').split(/\r?\n/).forEach(printLine);
  if (argv.follow) {
    tailFile(file, printLine);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
