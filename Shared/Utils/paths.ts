import { homedir } from 'node:os';
import { resolve, join } from 'node:path';

/**
 * Resolves Flotilla's on-disk layout under FLOTILLA_HOME (default ~/.flotilla).
 */
export class PathManager {
  private static instance: PathManager | undefined;
  private homeDir: string;

  private constructor() {
    this.homeDir = process.env.FLOTILLA_HOME
      ? resolve(process.env.FLOTILLA_HOME)
      : join(homedir(), '.flotilla');
  }

  public static getInstance(): PathManager {
    if (!PathManager.instance) {
      PathManager.instance = new PathManager();
    }
    return PathManager.instance;
  }

  /** Drop the cached instance so the next call re-reads FLOTILLA_HOME. */
  public static reset(): void {
    PathManager.instance = undefined;
  }

  public getHomeDir(): string {
    return this.homeDir;
  }

  public getAgentsDir(): string {
    return join(this.homeDir, 'agents');
  }

  public getDataDir(): string {
    return join(this.homeDir, 'data');
  }
}
