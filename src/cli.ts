import { Command } from 'commander';
import { CliOptions, ConfigError, DEFAULT_PORT, DEFAULT_RESTART_TRIGGER_FILE, loadConfig } from './config';
import { RunningServer, SERVICE_NAME, SERVICE_VERSION, startServer } from './server';

export function createProgram(): Command {
  const program = new Command();

  program
    .name(SERVICE_NAME)
    .description('Webhook server that syncs git repositories and signals the supervisor to reload')
    .version(SERVICE_VERSION)
    .option('--git-repo-dir <dir>', 'Parent directory for Git repositories (env: GIT_REPO_DIR)')
    .option('--port <port>', `Port for the server (env: PORT, default: ${DEFAULT_PORT})`)
    .option('--security-token <token>', 'Security token for webhook authentication (env: SECURITY_TOKEN)')
    .option('--debug', 'Enable debug mode (Warning: may expose sensitive information)')
    .option(
      '--restart-trigger <file>',
      `File touched to trigger a reload (env: RESTART_TRIGGER_FILE, default: ${DEFAULT_RESTART_TRIGGER_FILE})`,
    )
    .option('--poll-interval <ms>', 'Restart poll interval in milliseconds (env: POLL_INTERVAL_MS, default: 1000)')
    .option('--git-timeout <ms>', 'Timeout for each git command in milliseconds (env: GIT_TIMEOUT_MS, default: 120000)')
    .addHelpText(
      'after',
      '\nExample:\n  curl -X POST -H "X-Security-Token: TOKEN" http://localhost:5123/webhook/site',
    );

  return program;
}

function registerShutdown(running: RunningServer): void {
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully`);
    running
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

export async function run(argv: string[]): Promise<void> {
  const program = createProgram();
  program.parse(argv);

  try {
    const config = loadConfig(program.opts<CliOptions>());
    registerShutdown(await startServer(config));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}
