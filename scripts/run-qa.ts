/*
  Run the phantom QA pipeline on a zip archive or an extracted directory and
  print the report as JSON.
  Usage:
    npx tsx scripts/run-qa.ts --zip scan.zip --work ./tmp/work --plots ./tmp/plots
    npx tsx scripts/run-qa.ts --dir ./extracted --plots ./tmp/plots
*/
import path from 'path';
import { processArchive, runPhantomQaOnDirectory } from '../server/qa/pipeline';
import { logger } from '../server/logger';

async function main() {
  const args = process.argv.slice(2);
  const getArg = (k: string) => { const i = args.indexOf(k); return i > -1 ? args[i + 1] : undefined; };
  const zip = getArg('--zip');
  const dir = getArg('--dir');
  const plotDir = path.resolve(getArg('--plots') ?? 'plots');

  if (!zip && !dir) {
    console.error('Usage: --zip <archive.zip> [--work <dir>] | --dir <extracted dir>  [--plots <dir>]');
    process.exitCode = 1;
    return;
  }

  if (zip) {
    const workDir = path.resolve(getArg('--work') ?? `${path.basename(zip, path.extname(zip))}_extracted`);
    const result = await processArchive(path.resolve(zip), { workDir, plotDir });
    for (const entry of result.extraction.skipped) {
      logger.warn(`skipped archive entry ${entry.entryName}: ${entry.reason}`, 'run-qa');
    }
    console.log(JSON.stringify(result.report, null, 2));
  } else if (dir) {
    const result = await runPhantomQaOnDirectory(path.resolve(dir), { plotDir });
    console.log(JSON.stringify(result.report, null, 2));
  }
}

main().catch((error: unknown) => {
  logger.error(error, 'run-qa');
  process.exitCode = 1;
});
