import { Command } from 'commander';
import { getEnv } from '@infobox-query/config';
import { createLogger } from '@infobox-query/utils';
import { askOnce, formatSupportedQueries, runSession } from './session.js';
import { loadPatternTable } from './table.js';

const logger = createLogger({ service: 'cli' });

type GlobalOptions = {
  table?: string;
};

const program = new Command();

program
  .name('infobox-query')
  .description('Answer simple questions from Wikipedia infoboxes')
  .version(getEnv().APP_VERSION)
  .option('-t, --table <path>', 'YAML query table to load');

// Interactive session
program
  .command('chat', { isDefault: true })
  .description('Start an interactive session')
  .action(async () => {
    const table = loadPatternTable(program.opts<GlobalOptions>().table);
    await runSession({ table, input: process.stdin, output: process.stdout });
  });

// One-shot query
program
  .command('ask')
  .description('Answer a single query and exit')
  .argument('<words...>', 'the query, e.g. when was ada lovelace born')
  .action(async (words: string[]) => {
    const table = loadPatternTable(program.opts<GlobalOptions>().table);
    process.exitCode = await askOnce(table, words.join(' '), { out: process.stdout, err: process.stderr });
  });

// Table listing
program
  .command('queries')
  .description('List the queries the loaded table understands')
  .action(() => {
    const table = loadPatternTable(program.opts<GlobalOptions>().table);
    formatSupportedQueries(table).forEach((line) => process.stdout.write(`${line}\n`));
  });

program.parseAsync().catch((error: unknown) => {
  logger.fatal({ error }, 'Command failed');
  process.exitCode = 1;
});
