import { Command } from 'commander';

export const startCommand = new Command('start')
  .description('Start the integration hub server')
  .option('-p, --port <port>', 'Port to listen on', '5300')
  .option('--no-monitor', 'Disable the periodic adapter health monitor')
  .action(async (options: { port: string; monitor: boolean }) => {
    process.env.PORT = options.port;
    if (!options.monitor) {
      process.env.MONITORING_ENABLED = 'false';
    }
    console.log(`Starting integration hub on port ${options.port}...`);
    // Dynamic import so config is read after the overrides above
    await import('../../server');
  });
