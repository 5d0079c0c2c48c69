import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { existsSync, mkdirSync } from 'fs';
import { logger, LLM_CHOICES_FILENAME } from '@poe-relay/shared';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Path resolver for the Discord service
 * Handles both Docker (/app/data) and local development (./data) environments
 */
export class PathResolver {
  private readonly isDocker: boolean;
  private readonly dataDir: string;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.isDocker = this.detectDockerEnvironment(env);

    if (env.DATA_DIR) {
      this.dataDir = resolve(env.DATA_DIR);
    } else if (this.isDocker) {
      this.dataDir = '/app/data';
    } else {
      // Local development: <repo>/data
      this.dataDir = resolve(__dirname, '../../../../data');
    }

    logger.info(
      `📁 Path resolver initialized: ${this.isDocker ? 'Docker' : 'Local'} mode, data dir: ${this.dataDir}`
    );
  }

  /**
   * Detect if running in Docker container
   */
  private detectDockerEnvironment(env: NodeJS.ProcessEnv): boolean {
    const indicators = [
      // Docker creates /.dockerenv file
      existsSync('/.dockerenv'),
      !!env.DOCKER_CONTAINER,
      process.cwd() === '/app',
    ];

    return indicators.some((indicator) => indicator);
  }

  /**
   * Ensure data directory exists
   */
  public ensureDataDirectory(): string {
    try {
      if (!existsSync(this.dataDir)) {
        mkdirSync(this.dataDir, { recursive: true });
        logger.info(`📁 Created data directory: ${this.dataDir}`);
      }
      return this.dataDir;
    } catch (error) {
      logger.error(`Failed to create data directory: ${this.dataDir}`, error);
      throw new Error(`Cannot create data directory: ${this.dataDir}`);
    }
  }

  /**
   * Path of the guild model/session state file. An explicit path wins.
   */
  public getStateFilePath(override?: string): string {
    return override ? resolve(override) : join(this.dataDir, LLM_CHOICES_FILENAME);
  }
}
