import * as fs from 'fs';
import * as path from 'path';
import { LoggerInterface } from '../logging';
import {
  AdapterSettings,
  SettingsError,
  isLogLevel,
  validateSettings,
} from './adapterSettings';

/**
 * Loads adapter settings from JSON files and the environment.
 */
export class SettingsLoader {
  private readonly logger: LoggerInterface;

  constructor(logger: LoggerInterface) {
    this.logger = logger.child
      ? logger.child({ className: 'SettingsLoader' })
      : logger;
  }

  /**
   * Reads and validates a settings file.
   * @param settingsPath Absolute, or relative to the current directory.
   */
  public loadFromFile(settingsPath: string): Partial<AdapterSettings> {
    const resolvedPath = path.isAbsolute(settingsPath)
      ? settingsPath
      : path.resolve(process.cwd(), settingsPath);
    this.logger.info(`Loading adapter settings from ${resolvedPath}`);

    try {
      if (!fs.existsSync(resolvedPath)) {
        throw new SettingsError(`Settings file not found: ${resolvedPath}`);
      }
      const content = fs.readFileSync(resolvedPath, 'utf8');
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new SettingsError(
          `${resolvedPath}: invalid JSON (${error instanceof Error ? error.message : String(error)})`,
        );
      }
      const settings = validateSettings(parsed, resolvedPath);
      this.logger.debug(
        { keys: Object.keys(settings) },
        `Loaded adapter settings from ${resolvedPath}`,
      );
      return settings;
    } catch (error) {
      this.logger.error({ err: error }, 'Error loading adapter settings');
      throw new SettingsError(
        `Failed to load adapter settings: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Picks up `PERL_DAP_PERL_PATH` and `PERL_DAP_LOG_LEVEL`. An unrecognised
   * log level is ignored with a warning.
   */
  public loadFromEnvironment(env: NodeJS.ProcessEnv): Partial<AdapterSettings> {
    const settings: Partial<AdapterSettings> = {};
    const perlPath = env.PERL_DAP_PERL_PATH;
    if (perlPath) {
      settings.perlPath = perlPath;
    }
    const logLevel = env.PERL_DAP_LOG_LEVEL?.toLowerCase();
    if (logLevel) {
      if (isLogLevel(logLevel)) {
        settings.logLevel = logLevel;
      } else {
        this.logger.warn(
          `Ignoring PERL_DAP_LOG_LEVEL=${logLevel}: not a known log level`,
        );
      }
    }
    return settings;
  }
}
