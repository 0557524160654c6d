#!/usr/bin/env node

import { Command, Option } from 'commander';
import { diffCommand } from '../src/cli/commands/diff.js';
import type { OutputFormat } from '../src/cli/config.js';
import { RULE_KEY_LOGGER } from '../src/parser/patterns.js';

interface CliOptions {
  verbose?: boolean;
  checkPaths?: boolean;
  format?: OutputFormat;
}

const program = new Command();

program
  .name('rkdiff')
  .description('Explain RuleKey differences between two builds')
  .version('0.1.0')
  .argument('<left-log>', 'build log to look at first')
  .argument('<right-log>', 'build log to look at second')
  .argument('[build-target]', 'name of the target whose RuleKey you want to analyze')
  .option('-v, --verbose', 'Also list which referenced targets caused each field to change')
  .option('--check-paths', 'Report existence and hash of paths seen in differing values')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['terminal', 'json']))
  .addHelpText('after', `
RuleKey logging has to be enabled before the two builds are run:

  $ echo '${RULE_KEY_LOGGER}.level=FINER' > .bucklogging.properties

Run a 'before' and an 'after' build that differ as little as possible (for
example the same target from the same revision on two machines), then pass
both logs here together with the target to analyze. Without a target every
target present in both logs is compared. Restart the build daemon after
changing the logging settings, and undo the change once you are done since
the extra logging slows builds down.`)
  .showHelpAfterError()
  .action(async (leftLog: string, rightLog: string, buildTarget: string | undefined, opts: CliOptions) => {
    await diffCommand(leftLog, rightLog, {
      target: buildTarget,
      format: opts.format,
      verbose: opts.verbose,
      checkPaths: opts.checkPaths,
    });
  });

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(1);
}

await program.parseAsync();
