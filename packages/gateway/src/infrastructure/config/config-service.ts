/**
 * @file packages/gateway/src/infrastructure/config/config-service.ts
 * @description Exposes runtime configuration through the container.
 */

import { inject, singleton } from 'tsyringe';
import { loadConfig, type FieldLinkConfig } from '../../config.js';
import { Logger } from '../../logger.js';

@singleton()
export class ConfigService {
  private config: FieldLinkConfig | null = null;
  private projectRoot?: string;

  constructor(@inject(Logger) private logger: Logger) {}

  /**
   * Points subsequent loads at a project directory other than cwd.
   */
  public setProjectRoot(root: string): void {
    this.projectRoot = root;
    this.config = null;
  }

  public load(): FieldLinkConfig {
    try {
      this.config = loadConfig(this.projectRoot);
      return this.config;
    } catch (err) {
      this.logger.error({ err }, 'Failed to load config');
      throw err;
    }
  }

  public get<K extends keyof FieldLinkConfig>(key: K): FieldLinkConfig[K] {
    return this.getFullConfig()[key];
  }

  public getFullConfig(): FieldLinkConfig {
    return this.config ?? this.load();
  }
}
