/**
 * Server engine: owns the listening socket, the worker pool and shutdown.
 *
 * Shared state (log buffer via the logger, test-results store) is injected at
 * construction so each engine instance is isolated.
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import { promises as fs } from 'fs';
import { TestResultsStore } from '../api/results-store.js';
import type { ServerConfig } from '../config/types.js';
import { BindError, describeError, FatalStartupError } from '../errors.js';
import { ConnectionHandler, type ConnectionOutcome } from '../http/handler.js';
import { SocketConnection } from '../http/socket-connection.js';
import type { Logger } from '../logging/logger.js';
import { WorkerPool } from './pool.js';

export type LifecycleState = 'starting' | 'running' | 'shutting_down' | 'stopped';

export interface ServerEngineDeps {
  logger: Logger;
  results?: TestResultsStore;
  random?: () => number;
}

export interface BoundAddress {
  host: string;
  port: number;
}

/**
 * Events:
 * - `state` (LifecycleState) on every lifecycle transition
 * - `listening` (BoundAddress) once bound
 * - `connection-closed` (ConnectionOutcome) after each connection is closed
 */
export class ServerEngine extends EventEmitter {
  private state: LifecycleState = 'stopped';
  private server: net.Server | null = null;
  private handler: ConnectionHandler | null = null;
  private sandboxRoot: string | null = null;
  private address: BoundAddress | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private readonly pool: WorkerPool;
  private readonly logger: Logger;
  private readonly results: TestResultsStore;

  constructor(
    private readonly config: ServerConfig,
    private readonly deps: ServerEngineDeps
  ) {
    super();
    this.logger = deps.logger;
    this.results = deps.results ?? new TestResultsStore();
    this.pool = new WorkerPool(config.maxWorkers, {
      onTaskError: (error, workerName) => {
        this.logger.child(workerName).error(`Worker task failed: ${describeError(error)}`);
      },
    });

    this.logger.info(`Server initialized - ${config.host}:${config.port}`);
    this.logger.info(`Public dir: ${config.publicDir}`);
    this.logger.info(`Max workers: ${config.maxWorkers}`);
  }

  /**
   * Canonicalize the sandbox root, bind, and start accepting.
   * Throws a FatalStartupError if either step fails.
   */
  async start(): Promise<BoundAddress> {
    if (this.state !== 'stopped' || this.server) {
      throw new Error(`Cannot start server in state ${this.state}`);
    }
    this.setState('starting');

    let server: net.Server;
    try {
      this.sandboxRoot = await this.resolveSandboxRoot();
      this.handler = new ConnectionHandler({
        config: this.config,
        sandboxRoot: this.sandboxRoot,
        logger: this.logger,
        logBuffer: this.logger.buffer,
        results: this.results,
        random: this.deps.random,
      });
      server = await this.listen();
    } catch (error) {
      this.handler = null;
      this.setState('stopped');
      this.logger.error(`Startup failed: ${describeError(error)}`);
      throw error;
    }

    this.server = server;
    const address = server.address();
    this.address =
      address !== null && typeof address === 'object'
        ? { host: address.address, port: address.port }
        : { host: this.config.host, port: this.config.port };

    server.on('error', (error) => {
      this.logger.error(`Listener error: ${describeError(error)}`);
    });

    this.logger.info(`Listening on http://${this.address.host}:${this.address.port}`);
    this.setState('running');
    this.emit('listening', this.address);
    return this.address;
  }

  /**
   * Stop accepting, then wait for every dispatched connection to finish.
   * Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }
    if (this.state === 'stopped' && !this.server) {
      return Promise.resolve();
    }
    this.shutdownPromise = this.performShutdown().finally(() => {
      this.shutdownPromise = null;
    });
    return this.shutdownPromise;
  }

  onState(listener: (state: LifecycleState) => void): this {
    return this.on('state', listener);
  }

  onConnectionClosed(listener: (outcome: ConnectionOutcome) => void): this {
    return this.on('connection-closed', listener);
  }

  getState(): LifecycleState {
    return this.state;
  }

  getAddress(): BoundAddress | null {
    return this.address;
  }

  getSandboxRoot(): string | null {
    return this.sandboxRoot;
  }

  getResults(): TestResultsStore {
    return this.results;
  }

  getPool(): WorkerPool {
    return this.pool;
  }

  private async resolveSandboxRoot(): Promise<string> {
    let root: string;
    try {
      root = await fs.realpath(this.config.publicDir);
    } catch (error) {
      throw new FatalStartupError(`Public dir ${this.config.publicDir} cannot be resolved: ${describeError(error)}`, {
        cause: error,
      });
    }
    const stats = await fs.stat(root);
    if (!stats.isDirectory()) {
      throw new FatalStartupError(`Public dir ${root} is not a directory`);
    }
    return root;
  }

  private listen(): Promise<net.Server> {
    // Clients may half-close right after sending the request
    const server = net.createServer({ allowHalfOpen: true });
    server.on('connection', (socket) => this.accept(socket));

    return new Promise<net.Server>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off('listening', onListening);
        reject(
          new BindError(`Cannot listen on ${this.config.host}:${this.config.port}: ${describeError(error)}`, {
            cause: error,
          })
        );
      };
      const onListening = () => {
        server.off('error', onError);
        resolve(server);
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(this.config.port, this.config.host);
    });
  }

  private accept(socket: net.Socket): void {
    const handler = this.handler;
    if (this.state !== 'running' || !handler) {
      socket.destroy();
      return;
    }

    const connection = new SocketConnection(socket);
    this.pool.submit(async (workerName) => {
      const outcome = await handler.handle(connection, workerName);
      this.emit('connection-closed', outcome);
    });
  }

  private async performShutdown(): Promise<void> {
    this.logger.info('Shutting down server...');
    this.setState('shutting_down');

    const server = this.server;
    const closed = server
      ? new Promise<void>((resolve) => {
          server.close(() => resolve());
        })
      : Promise.resolve();

    await this.pool.drain();
    await closed;

    this.server = null;
    this.handler = null;
    this.logger.info('Server stopped');
    this.setState('stopped');
  }

  private setState(state: LifecycleState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('state', state);
  }
}
