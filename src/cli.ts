#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { ArborError } from './lib/errors.js';
import { outputError } from './lib/output.js';

const program = new Command();

program
  .name('arbor')
  .description('Git worktrees paired with persistent tmux sessions for coding agents')
  .version('0.1.0');

program
  .command('list')
  .alias('ls')
  .description('List worktrees with their state and live sessions')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { listCommand } = await import('./commands/list.js');
    await listCommand(options);
  });

program
  .command('create')
  .description('Create a worktree for a new or existing branch')
  .argument('<branch>', 'Branch name')
  .option('-e, --existing', 'Check out an existing branch instead of creating one')
  .option('-b, --base <branch>', 'Base branch for a new branch')
  .option('--json', 'Output as JSON')
  .action(async (branch, options) => {
    const { createCommand } = await import('./commands/create.js');
    await createCommand(branch, options);
  });

program
  .command('delete')
  .alias('rm')
  .description('Delete a worktree and kill its sessions')
  .argument('<target>', 'Worktree path, branch or directory name')
  .option('-f, --force', 'Delete even with uncommitted changes')
  .option('--json', 'Output as JSON')
  .action(async (target, options) => {
    const { deleteCommand } = await import('./commands/delete.js');
    await deleteCommand(target, options);
  });

program
  .command('switch')
  .description('Open the agent (or terminal) session of a worktree')
  .argument('<target>', 'Worktree path, branch or directory name')
  .option('-t, --terminal', 'Open the plain terminal session')
  .option('--json', 'Output as JSON')
  .action(async (target, options) => {
    const { switchCommand } = await import('./commands/switch.js');
    await switchCommand(target, options);
  });

program
  .command('kill')
  .description('Kill the agent (or terminal) session of a worktree')
  .argument('<target>', 'Worktree path, branch or directory name')
  .option('-t, --terminal', 'Kill the terminal session')
  .option('--json', 'Output as JSON')
  .action(async (target, options) => {
    const { killCommand } = await import('./commands/kill.js');
    await killCommand(target, options);
  });

program
  .command('sessions')
  .description('List sessions carrying the repository prefix')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { sessionsCommand } = await import('./commands/sessions.js');
    await sessionsCommand(options);
  });

program
  .command('rename')
  .description('Rename a worktree branch; its sessions follow')
  .argument('<target>', 'Worktree path, branch or directory name')
  .argument('<new-branch>', 'New branch name')
  .option('--json', 'Output as JSON')
  .action(async (target, newBranch, options) => {
    const { renameCommand } = await import('./commands/branch.js');
    await renameCommand(target, newBranch, options);
  });

program
  .command('checkout')
  .description('Check out another branch in a worktree')
  .argument('<target>', 'Worktree path, branch or directory name')
  .argument('<branch>', 'Branch to check out')
  .option('--json', 'Output as JSON')
  .action(async (target, branch, options) => {
    const { checkoutCommand } = await import('./commands/branch.js');
    await checkoutCommand(target, branch, options);
  });

program
  .command('base')
  .description("Change a worktree's base branch")
  .argument('<target>', 'Worktree path, branch or directory name')
  .argument('<branch>', 'New base branch')
  .option('--json', 'Output as JSON')
  .action(async (target, branch, options) => {
    const { baseCommand } = await import('./commands/branch.js');
    await baseCommand(target, branch, options);
  });

program
  .command('fetch')
  .description('Fetch from the remote')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { fetchCommand } = await import('./commands/remote.js');
    await fetchCommand(options);
  });

program
  .command('pull')
  .description('Merge the base branch into a worktree')
  .argument('<target>', 'Worktree path, branch or directory name')
  .option('-b, --base <branch>', 'Branch to merge (default: configured base)')
  .option('--json', 'Output as JSON')
  .action(async (target, options) => {
    const { pullCommand } = await import('./commands/remote.js');
    await pullCommand(target, options);
  });

program
  .command('push')
  .description('Push the worktree branch')
  .argument('<target>', 'Worktree path, branch or directory name')
  .option('--json', 'Output as JSON')
  .action(async (target, options) => {
    const { pushCommand } = await import('./commands/remote.js');
    await pushCommand(target, options);
  });

program
  .command('pr')
  .description('Record a pull-request URL for a worktree')
  .argument('<target>', 'Worktree path, branch or directory name')
  .argument('<url>', 'Pull-request URL')
  .option('--json', 'Output as JSON')
  .action(async (target, url, options) => {
    const { prCommand } = await import('./commands/pr.js');
    await prCommand(target, url, options);
  });

program
  .command('config')
  .description('Show or update repository settings')
  .option('--base-branch <branch>', 'Default base branch for new worktrees')
  .option('--interval <seconds>', 'Auto-fetch interval (0 = default)')
  .option('--editor <command>', 'Editor command')
  .option('--theme <name>', 'Theme name')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    const { configCommand } = await import('./commands/config.js');
    await configCommand(options);
  });

program
  .command('watch')
  .description('Keep the worktree list on screen and refresh it until interrupted')
  .option('--no-fetch', 'Do not fetch from the remote periodically')
  .action(async (options) => {
    const { watchCommand } = await import('./commands/watch.js');
    await watchCommand(options);
  });

program.exitOverride();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof ArborError) {
      outputError(err, process.argv.includes('--json'));
      process.exit(err.exitCode);
    }
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    outputError(err, false);
    process.exit(1);
  }
}

await main();
