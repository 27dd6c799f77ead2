/**
 * Ping Command
 *
 * Check that the API server is up and can run ffprobe.
 */

import ora from 'ora';
import { ApiClient, ApiRequestError } from '../lib/apiClient.js';
import { loadCliConfig } from '../config/index.js';
import { pingSchema } from '../lib/schemas.js';
import { printError, printJson, printKeyValue, printWarning } from '../lib/output.js';

interface PingOptions {
  json?: boolean;
}

export async function pingCommand(options: PingOptions): Promise<void> {
  const config = loadCliConfig();
  const client = new ApiClient(config);
  const spinner = ora(`Pinging ${config.apiUrl}...`).start();

  try {
    const response = await client.get('/ping');
    // 503 still carries a ping body
    if (response.statusCode !== 200 && response.statusCode !== 503) {
      throw new ApiRequestError(response.statusCode, response.body);
    }
    const ping = pingSchema.parse(response.body);
    spinner.stop();

    if (options.json) {
      printJson(ping);
    } else if (ping.status === 'ok') {
      spinner.succeed(ping.message);
      printKeyValue('ffprobe', ping.ffprobe.version ?? 'available');
    } else {
      printWarning(ping.message);
    }

    if (ping.status !== 'ok') {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail('API server is not reachable');
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
