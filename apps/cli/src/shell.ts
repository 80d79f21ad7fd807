import chalk from 'chalk';
import type { Logger } from '@termmail/shared';
import { printPage, runCommand, type ShellContext } from './commands';
import { InputClosedError } from './terminal';

const PROMPT = '> ';

/** Read-eval loop until Q or end of input. */
export async function runShell(ctx: ShellContext, logger: Logger): Promise<void> {
  const initial = await ctx.controller.loadInitial();
  if (initial.ok) printPage(ctx, initial.search);
  else ctx.term.print(chalk.red(`Error: ${initial.error.message}`));
  ctx.term.print(chalk.dim('H for help, Q to quit.'));

  for (;;) {
    let line: string;
    try {
      line = await ctx.term.ask(PROMPT);
    } catch (err) {
      if (err instanceof InputClosedError) return;
      throw err;
    }
    try {
      if ((await runCommand(ctx, line)) === 'quit') return;
    } catch (err) {
      if (err instanceof InputClosedError) return;
      logger.error(err instanceof Error ? err.message : String(err));
    }
  }
}
