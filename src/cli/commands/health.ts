import { Command } from 'commander';
import http from 'http';
import { z } from 'zod';

const componentSchema = z.object({ status: z.string(), message: z.string() });

const healthSchema = z.object({
  status: z.enum(['healthy', 'degraded', 'unhealthy']),
  checks: z.object({ storage: componentSchema, integrations: componentSchema }),
});

export type HealthResponse = z.infer<typeof healthSchema>;

/** One line per component, e.g. `storage: degraded (Using in-memory store ...)`. */
export function formatHealth(health: HealthResponse): string[] {
  return [
    `Status: ${health.status.toUpperCase()}`,
    ...Object.entries(health.checks).map(([name, check]) => `${name}: ${check.status} (${check.message})`),
  ];
}

export const healthCommand = new Command('health')
  .description('Check integration hub health')
  .option('-p, --port <port>', 'Server port', '5300')
  .option('--json', 'Output raw JSON')
  .action((options: { port: string; json?: boolean }) => {
    const url = `http://localhost:${options.port}/health`;

    http.get(url, (res) => {
      let data = '';
      res.on('data', (chunk: Buffer) => { data += chunk.toString(); });
      res.on('end', () => {
        let health: HealthResponse;
        try {
          health = healthSchema.parse(JSON.parse(data));
        } catch {
          console.error('Failed to parse health response');
          process.exit(1);
        }
        if (options.json) {
          console.log(JSON.stringify(health, null, 2));
        } else {
          for (const line of formatHealth(health)) {
            console.log(line);
          }
        }
        process.exit(health.status === 'unhealthy' ? 1 : 0);
      });
    }).on('error', (err) => {
      console.error(`Cannot connect to integration hub on port ${options.port}: ${err.message}`);
      process.exit(1);
    });
  });
