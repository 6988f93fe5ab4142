import fs from 'fs-extra';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { filterByKeywords, parseKeywords } from '../pipeline/filter';
import { extractTimestamps } from '../pipeline/timestamps';

/*
 * parse.ts - offline check of a description: prints the timestamp entries it
 * yields (optionally keyword-filtered) as JSON. Reads stdin without --file.
 */
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('file', { type: 'string', describe: 'Description text file (default: stdin)' })
    .option('keywords', { type: 'string', describe: 'Comma-separated label filters' })
    .strict()
    .parse();

  const text = argv.file ? await fs.readFile(argv.file, 'utf8') : await readStdin();
  const entries = extractTimestamps(text);
  const out = argv.keywords !== undefined ? filterByKeywords(entries, parseKeywords(argv.keywords)) : entries;
  console.log(JSON.stringify(out, null, 2));
  console.error(`${out.length} of ${entries.length} entries`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
