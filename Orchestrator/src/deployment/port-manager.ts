import { createServer } from 'node:net';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '@flotilla/shared/Utils/logger.js';
import { ResourceExhaustedError } from '../utils/errors.js';

const log = logger.child('port-manager');

/** Resolves true when the port can be bound right now */
export type PortCheck = (port: number, host: string) => Promise<boolean>;

/**
 * Bind-test a port on the given host and release it immediately.
 */
export const isPortFree: PortCheck = (port, host) =>
  new Promise((resolve) => {
    const server = createServer();
    server.once('error', () => resolve(false));
    server.listen({ port, host, exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });

export interface PortManagerOptions {
  basePort: number;
  maxPorts: number;
  host?: string;
  portCheck?: PortCheck;
}

interface PortRegistryFile {
  basePort: number;
  assignments: Record<string, number>;
}

/**
 * First-fit port allocator over [basePort, basePort + maxPorts).
 *
 * Free ports are found by bind test. With a registry file, the held set
 * survives restarts: owners loaded from it keep their ports until released.
 */
export class PortManager {
  readonly basePort: number;
  readonly maxPorts: number;
  private readonly host: string;
  private readonly portCheck: PortCheck;

  private assignments = new Map<string, number>();
  private allocated = new Set<number>();

  private registryPath: string | null = null;
  private allocationQueue: Promise<unknown> = Promise.resolve();
  private saveQueue: Promise<void> = Promise.resolve();

  constructor(options: PortManagerOptions) {
    this.basePort = options.basePort;
    this.maxPorts = options.maxPorts;
    this.host = options.host ?? '127.0.0.1';
    this.portCheck = options.portCheck ?? isPortFree;
  }

  /**
   * Enable persistence and re-populate the held set from the registry.
   * Entries outside the current range, and second claims on a port, are dropped.
   */
  async setRegistryPath(path: string): Promise<void> {
    this.registryPath = path;
    if (!existsSync(path)) return;

    try {
      const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
      const assignments =
        typeof parsed === 'object' && parsed !== null && 'assignments' in parsed ? parsed.assignments : undefined;
      if (typeof assignments !== 'object' || assignments === null) return;

      let loaded = 0;
      for (const [owner, port] of Object.entries(assignments)) {
        if (typeof port !== 'number' || !Number.isInteger(port) || !this.inRange(port)) {
          log.warn(`Dropping registry entry ${owner}=${String(port)} outside ${this.describeRange()}`);
          continue;
        }
        if (this.allocated.has(port) || this.assignments.has(owner)) {
          log.warn(`Dropping duplicate registry entry ${owner}=${port}`);
          continue;
        }
        this.assignments.set(owner, port);
        this.allocated.add(port);
        loaded++;
      }
      log.info(`Loaded ${loaded} port assignments from registry`, { path });
    } catch (error) {
      log.error('Failed to load port registry', { path, error });
    }
  }

  /**
   * Reserve a port for `owner`. Idempotent: an owner that already holds a
   * port gets it back. A `preferred` port is taken when it is unheld and
   * bindable; otherwise the range is scanned first-fit. Concurrent calls
   * are serialized.
   * @throws ResourceExhaustedError when the range has no bindable port
   */
  allocate(owner: string, preferred?: number): Promise<number> {
    const run = this.allocationQueue.then(() => this.doAllocate(owner, preferred));
    this.allocationQueue = run.catch(() => undefined);
    return run;
  }

  private async doAllocate(owner: string, preferred: number | undefined): Promise<number> {
    const existing = this.assignments.get(owner);
    if (existing !== undefined) {
      log.debug(`Owner ${owner} already holds port ${existing}`);
      return existing;
    }

    if (preferred !== undefined && !this.allocated.has(preferred) && (await this.portCheck(preferred, this.host))) {
      this.register(owner, preferred);
      return preferred;
    }

    for (let offset = 0; offset < this.maxPorts; offset++) {
      const candidate = this.basePort + offset;
      if (this.allocated.has(candidate)) continue;
      if (await this.portCheck(candidate, this.host)) {
        this.register(owner, candidate);
        return candidate;
      }
    }

    throw new ResourceExhaustedError(
      `No available ports in range ${this.describeRange()}`,
      { owner, allocated: this.allocated.size }
    );
  }

  release(owner: string): void {
    const port = this.assignments.get(owner);
    if (port === undefined) {
      log.warn(`Owner ${owner} has no allocated port to release`);
      return;
    }
    this.assignments.delete(owner);
    this.allocated.delete(port);
    log.info(`Released port ${port} from ${owner}`);
    this.scheduleSave();
  }

  getPort(owner: string): number | undefined {
    return this.assignments.get(owner);
  }

  isAllocated(port: number): boolean {
    return this.allocated.has(port);
  }

  getAllocatedPorts(): Set<number> {
    return new Set(this.allocated);
  }

  getAvailableCount(): number {
    return this.maxPorts - this.allocated.size;
  }

  /** Release every allocation, e.g. on shutdown. */
  cleanup(): void {
    log.info(`Cleaning up ${this.allocated.size} allocated ports`);
    this.assignments.clear();
    this.allocated.clear();
    this.scheduleSave();
  }

  /** Resolves once every queued registry write has finished. */
  flush(): Promise<void> {
    return this.saveQueue;
  }

  /** Owners currently holding a port */
  getOwners(): string[] {
    return [...this.assignments.keys()];
  }

  private describeRange(): string {
    return `${this.basePort}-${this.basePort + this.maxPorts - 1}`;
  }

  private inRange(port: number): boolean {
    return port >= this.basePort && port < this.basePort + this.maxPorts;
  }

  private register(owner: string, port: number): void {
    this.assignments.set(owner, port);
    this.allocated.add(port);
    log.info(`Allocated port ${port} to ${owner}`);
    this.scheduleSave();
  }

  private scheduleSave(): void {
    const path = this.registryPath;
    if (!path) return;

    const doSave = async (): Promise<void> => {
      const data: PortRegistryFile = {
        basePort: this.basePort,
        assignments: Object.fromEntries(this.assignments),
      };
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, JSON.stringify(data, null, 2));
      } catch (error) {
        log.error('Failed to save port registry', { path, error });
      }
    };
    this.saveQueue = this.saveQueue.then(doSave, doSave);
  }
}
