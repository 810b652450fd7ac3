import type { Command } from '../types.js';
import { ExitCode } from '../types.js';
import { loadConfig, validateExternalConfig } from '../../config/loader.js';

export const configCommand: Command = {
  name: 'config',
  description: 'Show or validate configuration',
  usage: 'pgvector-wire config <show|validate>',
  handler: async (args) => {
    const subcommand = args[0];

    switch (subcommand) {
      case 'show': {
        const config = loadConfig();
        console.log(JSON.stringify(config, null, 2));
        break;
      }
      case 'validate': {
        const config = loadConfig();
        const errors = validateExternalConfig(config);
        if (errors.length === 0) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration errors:');
          for (const error of errors) {
            console.error(`  - ${error}`);
          }
          process.exit(ExitCode.INVALID_CONFIG);
        }
        break;
      }
      default:
        console.error('Error: Unknown subcommand');
        console.log('Usage: pgvector-wire config <show|validate>');
        process.exit(ExitCode.USAGE);
    }
  },
};
