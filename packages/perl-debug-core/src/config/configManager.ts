import { LoggerInterface } from '../logging';
import { AdapterSettings, DEFAULT_SETTINGS } from './adapterSettings';
import { SettingsLoader } from './settingsLoader';

type SettingsLayer = 'packaged' | 'user' | 'environment' | 'overrides';

const LAYER_ORDER: readonly SettingsLayer[] = [
  'packaged',
  'user',
  'environment',
  'overrides',
];

/**
 * Merges settings from every source. Later layers win:
 * built-in defaults, the packaged defaults file, the user's file, the
 * environment, then explicit overrides such as command-line flags.
 */
export class ConfigManager {
  private readonly logger: LoggerInterface;
  private readonly settingsLoader: SettingsLoader;
  private readonly layers = new Map<SettingsLayer, Partial<AdapterSettings>>();

  constructor(logger: LoggerInterface) {
    this.logger = logger.child
      ? logger.child({ className: 'ConfigManager' })
      : logger;
    this.settingsLoader = new SettingsLoader(this.logger);
  }

  /** Loads the defaults file shipped with the adapter. */
  public loadPackagedDefaults(settingsPath: string): void {
    this.layers.set('packaged', this.settingsLoader.loadFromFile(settingsPath));
  }

  public loadUserSettings(settingsPath: string): void {
    this.layers.set('user', this.settingsLoader.loadFromFile(settingsPath));
    this.logger.info(`Applied user settings from ${settingsPath}`);
  }

  public applyEnvironment(env: NodeJS.ProcessEnv): void {
    this.layers.set('environment', this.settingsLoader.loadFromEnvironment(env));
  }

  public applyOverrides(overrides: Partial<AdapterSettings>): void {
    const defined: Partial<AdapterSettings> = {};
    for (const [key, value] of Object.entries(overrides)) {
      if (value !== undefined) {
        Object.assign(defined, { [key]: value });
      }
    }
    this.layers.set('overrides', {
      ...this.layers.get('overrides'),
      ...defined,
    });
  }

  /** The effective settings; a fresh object on every call. */
  public getSettings(): AdapterSettings {
    let settings: AdapterSettings = {
      ...DEFAULT_SETTINGS,
      perlArgs: [...DEFAULT_SETTINGS.perlArgs],
      env: { ...DEFAULT_SETTINGS.env },
    };
    for (const layer of LAYER_ORDER) {
      const values = this.layers.get(layer);
      if (!values) continue;
      settings = {
        ...settings,
        ...values,
        env: { ...settings.env, ...values.env },
      };
    }
    return settings;
  }
}
