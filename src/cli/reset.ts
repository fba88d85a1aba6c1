import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import path from 'path';
import { ENV } from '../pipeline/env';
import { removeChunkFiles } from '../pipeline/chunk';
import { CheckpointStore } from '../pipeline/checkpoint';

/*
 * reset.ts - destructive cleanup utility.
 * By default does NOTHING unless flags provided.
 * Operations:
 *   --chunks      : delete chunk audio (chunk_NN.*, leftover .part files)
 *   --checkpoints : delete per-chunk transcripts (transcript_chunk_NN.md)
 *   --all         : both
 * Safety:
 *   Requires --yes to perform deletions. Otherwise prints plan only.
 */
async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('chunks', { type: 'boolean', default: false })
    .option('checkpoints', { type: 'boolean', default: false })
    .option('all', { type: 'boolean', default: false })
    .option('chunks-dir', { type: 'string', default: ENV.chunksDir })
    .option('checkpoint-dir', { type: 'string', describe: 'Defaults to the chunks dir' })
    .option('yes', { type: 'boolean', default: false, describe: 'Confirm destructive actions' })
    .help()
    .strict()
    .parse();

  const chunksDir = argv['chunks-dir'];
  const store = new CheckpointStore(argv['checkpoint-dir'] ?? chunksDir);
  const ops = {
    chunks: argv.all || argv.chunks,
    checkpoints: argv.all || argv.checkpoints,
  };

  const plan: string[] = [];
  if (ops.chunks) plan.push(`Delete chunk audio in: ${path.resolve(chunksDir)}`);
  if (ops.checkpoints) {
    const existing = await store.list();
    plan.push(`Delete ${existing.length} chunk transcript(s) in: ${path.resolve(store.dir)}`);
  }

  if (!plan.length) {
    console.log('Nothing selected. Use --all or specific flags (see --help).');
    return;
  }
  console.log('Reset plan:');
  for (const p of plan) console.log(' -', p);

  if (!argv.yes) {
    console.log('\nDry run only. Re-run with --yes to execute.');
    return;
  }

  if (ops.chunks) {
    const removed = await removeChunkFiles(chunksDir);
    console.log(`Removed ${removed.length} chunk file(s).`);
  }
  if (ops.checkpoints) {
    const count = await store.clear();
    console.log(`Removed ${count} checkpoint(s).`);
  }
  console.log('Reset complete.');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
