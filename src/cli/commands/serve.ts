import type { Command } from '../types.js';
import { assertValidConfig, loadConfig } from '../../config/loader.js';
import { parseInteger } from '../../input/parse-requests.js';
import { exitWithError } from '../utils.js';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the HTTP scheduling API',
  usage: 'disksched serve [--port <port>]',
  handler: async (args) => {
    const config = loadConfig();
    assertValidConfig(config);

    const portIndex = args.indexOf('--port');
    let port = config.server.port;
    if (portIndex >= 0) {
      const parsed = parseInteger(args[portIndex + 1], '--port');
      if (!parsed.ok) {
        exitWithError(parsed.error.message, 2, serveCommand.usage);
        return;
      }
      if (parsed.value > 65535) {
        exitWithError('--port must be between 0 and 65535', 2, serveCommand.usage);
        return;
      }
      port = parsed.value;
    }

    const { startServer } = await import('../../server/app.js');
    await startServer(port, config);
  },
};
