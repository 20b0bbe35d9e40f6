/**
 * Configuration parser
 * Order: default < env < cli
 */
import { ParameterError } from './errors';

export type ConfigValue = string | number | boolean;
export type ConfigValues = Record<string, ConfigValue>;

export type ConfigEntry = [
  string, // arg
  string, // env value
  ConfigValue, // default value
  ('string' | 'number' | 'boolean')?, // type
];

export type ConfigTemplate = ConfigEntry[];

export class ConfigParser {
  private config: ConfigTemplate;
  private env: NodeJS.ProcessEnv;

  constructor(config: ConfigTemplate, env: NodeJS.ProcessEnv = process.env) {
    this.config = config;
    this.env = env;
  }

  parse(argv: string[] = process.argv): ConfigValues {
    const result: ConfigValues = {};
    const cliArgs = this.parseCliArgs(argv);
    for (const entry of this.config) {
      const [cliArg, envVar, defaultValue, type] = entry;
      let value: ConfigValue = defaultValue;

      // Override with env value if exists
      const envValue = this.env[envVar];
      if (envValue !== undefined) {
        if (type === 'boolean') {
          value = envValue.toLowerCase() === 'true';
        } else if (type === 'number') {
          value = this.toNumber(envValue, envVar);
        } else {
          value = envValue;
        }
      }

      // Override with CLI arg if exists
      const cliValue = cliArgs.get(cliArg);
      if (cliValue !== undefined) {
        value = cliValue;
      }

      result[this.getKeyFromCliArg(cliArg)] = value;
    }
    return result;
  }

  // Command-line parser
  private parseCliArgs(argv: string[]): Map<string, ConfigValue> {
    const args = new Map<string, ConfigValue>();

    for (let i = 2; i < argv.length; i++) {
      const arg = argv[i];
      if (!arg.startsWith('-')) continue;
      const configEntry = this.config.find(entry => entry[0] === arg);
      if (!configEntry) continue;

      if (configEntry[3] === 'boolean') {
        args.set(arg, true);
        continue;
      }
      const nextArg = argv[i + 1];
      if (nextArg === undefined) {
        throw new ParameterError(`Missing value for ${arg}`);
      }
      args.set(
        arg,
        configEntry[3] === 'number' ? this.toNumber(nextArg, arg) : nextArg
      );
      i++; // skip the value
    }

    return args;
  }

  private toNumber(value: string, source: string): number {
    const n = parseInt(value, 10);
    if (Number.isNaN(n)) {
      throw new ParameterError(`${source} expects a number, got "${value}"`);
    }
    return n;
  }

  private getKeyFromCliArg(cliArg: string): string {
    return cliArg.replace(/^-+/, '').replace(/-/g, '_');
  }
}

export function parseConfig(
  config: ConfigTemplate,
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): ConfigValues {
  const parser = new ConfigParser(config, env);
  return parser.parse(argv);
}
