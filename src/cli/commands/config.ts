import type { Command } from '../types.js';
import { loadConfig, validateExternalConfig, type LoadConfigOptions, type ResolvedConfig } from '../../config/loader.js';
import { isConfigError } from '../../utils/errors.js';

/**
 * Print config problems and exit with code 3.
 */
export function reportConfigErrors(errors: string[]): never {
  console.error('Configuration errors:');
  for (const error of errors) {
    console.error(`  - ${error}`);
  }
  process.exit(3);
}

/**
 * Load config for a CLI command. Unreadable or wrongly typed config files
 * exit with code 3 like failed validation does.
 */
export function loadCliConfig(options?: LoadConfigOptions): ResolvedConfig {
  try {
    return loadConfig(options);
  } catch (error) {
    if (isConfigError(error)) {
      reportConfigErrors([error.message]);
    }
    throw error;
  }
}

export const configCommand: Command = {
  name: 'config',
  description: 'Manage configuration',
  usage: 'tourkit config <show|validate>',
  handler: async (args) => {
    const subcommand = args[0];

    switch (subcommand) {
      case 'show': {
        const config = loadCliConfig();
        console.log(JSON.stringify(config, null, 2));
        break;
      }
      case 'validate': {
        const config = loadCliConfig();
        const errors = validateExternalConfig(config);
        if (errors.length > 0) {
          reportConfigErrors(errors);
        }
        console.log('Configuration is valid.');
        break;
      }
      default:
        console.error('Error: Unknown subcommand');
        console.log(`Usage: ${configCommand.usage}`);
        process.exit(2);
    }
  },
};
