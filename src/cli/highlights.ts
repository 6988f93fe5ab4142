import path from 'path';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { isHighlightError } from '../pipeline/errors';
import { error, info, setLogFile } from '../pipeline/log';
import { parseHighlightArgs } from '../pipeline/options';
import { runHighlights } from '../pipeline/run';

async function main() {
  if (ENV.logFile) setLogFile(ENV.logFile);
  const opts = parseHighlightArgs(hideBin(process.argv));
  const res = await runHighlights(opts);

  console.log(`\nTimestamps found: ${res.entries.length}, matching keywords: ${res.matched.length}`);
  for (const c of res.conditions) {
    console.log(` ! ${c.kind}: ${JSON.stringify({ ...c, kind: undefined })}`);
  }
  if (res.outcome === 'no-highlights') {
    console.log('No highlights produced.');
    return;
  }
  console.log('Artifacts:');
  if (res.reelPath) console.log(' - reel:', path.resolve(res.reelPath));
  if (res.sourcePath) console.log(' - source:', path.resolve(res.sourcePath));
  for (const c of res.clips) console.log(' - clip:', path.resolve(c.outputPath));
  info('cli.done', { outcome: res.outcome });
}

main().catch((e) => {
  if (isHighlightError(e)) {
    error('cli.failed', { name: e.name, code: e.code, error: e.message, details: e.details });
    console.error(`\n${e.name}: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
