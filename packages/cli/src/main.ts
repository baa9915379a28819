import { createSimulation } from '@marketsim/agent';
import { createReadlinePrompter } from './prompts.js';
import { parseCliArgs } from './args.js';
import { resolveConfig, runInTerminal, startDashboard } from './run.js';

async function main(argv: readonly string[]): Promise<void> {
  const args = parseCliArgs(argv);
  const needsPrompt = args.configPath === undefined && args.agentCount === undefined;
  const interactive = !args.batch && !args.serve;
  const prompter = needsPrompt || interactive ? createReadlinePrompter() : undefined;

  try {
    console.log('📈 Market simulation starting...');
    const config = await resolveConfig({ configPath: args.configPath, agentCount: args.agentCount, prompter });
    console.log(`   Agents: ${String(config.agentCount)}, horizon: ${String(config.horizon)} years, seed: ${config.seed === undefined ? 'random' : String(config.seed)}`);
    const engine = createSimulation(config);

    if (args.serve) {
      prompter?.close();
      const dashboard = await startDashboard(engine, { port: args.port });
      let isShuttingDown = false;
      const shutdown = (): void => {
        if (isShuttingDown) return;
        isShuttingDown = true;
        console.log('\n🛑 Shutting down...');
        dashboard.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error('Shutdown failed:', err instanceof Error ? err.message : err);
            process.exit(1);
          },
        );
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
      return;
    }

    await runInTerminal(engine, config, { batch: args.batch, prompter });
  } finally {
    if (!args.serve) prompter?.close();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error('Simulation failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
