import { spawn } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { BackoffConfig } from '../config.js';
import { Backoff } from '../lib/backoff.js';
import { logger } from '../lib/logger.js';
import { RTSP_STREAM_PATH } from '../protocol/constants.js';
import type { AccessCredential, ProxyRunner } from '../types.js';

/** The part of a child process the relay relies on. */
export interface RelayProcess {
  readonly pid?: number;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnRelayProcess = (command: string, args: string[]) => RelayProcess;

export interface RelayExit {
  name: 'mediamtx' | 'ffmpeg';
  code: number | null;
  signal: NodeJS.Signals | null;
  restarts: number;
  error?: Error;
}

export type RelayExitDecision = 'retry' | 'exit';

export interface RtspRelayOptions {
  printerIp: string;
  credential: AccessCredential;
  bindAddress: string;
  rtspPort: number;
  backoff: BackoffConfig;
  /** Asked each time a relay process dies; the default always retries. */
  onExit?: (exit: RelayExit) => RelayExitDecision;
  onFatal?: (exit: RelayExit) => void;
  spawnProcess?: SpawnRelayProcess;
  wait?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const log = logger.child({ component: 'rtsp' });

const defaultSpawn: SpawnRelayProcess = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'ignore', 'inherit'] });

export function buildMediamtxConfig(bindAddress: string, rtspPort: number): string {
  return [
    'logLevel: warn',
    `rtspAddress: ${bindAddress}:${rtspPort}`,
    'rtmp: no',
    'hls: no',
    'webrtc: no',
    'srt: no',
    'paths:',
    '  stream:',
    '    source: publisher',
    '',
  ].join('\n');
}

export function buildFfmpegArgs(
  options: Pick<RtspRelayOptions, 'printerIp' | 'credential' | 'rtspPort' | 'bindAddress'>,
): string[] {
  const { username, accessCode } = options.credential;
  const publishHost = options.bindAddress === '0.0.0.0' ? '127.0.0.1' : options.bindAddress;
  const source = `rtsps://${username}:${encodeURIComponent(accessCode)}@${options.printerIp}:${options.rtspPort}${RTSP_STREAM_PATH}`;
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-rtsp_transport',
    'tcp',
    '-i',
    source,
    '-c',
    'copy',
    '-f',
    'rtsp',
    `rtsp://${publishHost}:${options.rtspPort}/stream`,
  ];
}

/**
 * Keeps one child process running, restarting it with backoff until the
 * exit policy says otherwise.
 */
class SupervisedProcess {
  private child: RelayProcess | null = null;
  private running = false;
  private restarts = 0;
  private loop: Promise<void> | null = null;
  private sleeper: AbortController | null = null;
  private readonly backoff: Backoff;

  constructor(
    readonly name: RelayExit['name'],
    private readonly command: string,
    private readonly args: string[],
    private readonly options: RtspRelayOptions,
    private readonly onGiveUp: (exit: RelayExit) => void,
  ) {
    this.backoff = new Backoff(options.backoff);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.runLoop();
  }

  async stop(): Promise<void> {
    this.running = false;
    this.sleeper?.abort();
    this.child?.kill('SIGTERM');
    await this.loop;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  get restartCount(): number {
    return this.restarts;
  }

  private async runLoop(): Promise<void> {
    const spawnProcess = this.options.spawnProcess ?? defaultSpawn;
    const wait: NonNullable<RtspRelayOptions['wait']> =
      this.options.wait ?? ((ms, signal) => sleep(ms, undefined, { signal }));

    while (this.running) {
      const child = spawnProcess(this.command, this.args);
      this.child = child;
      log.info({ process: this.name, pid: child.pid }, 'relay_process_started');

      const exit = await new Promise<RelayExit>((resolve) => {
        child.once('exit', (code, signal) =>
          resolve({ name: this.name, code, signal, restarts: this.restarts }),
        );
        child.once('error', (error) =>
          resolve({ name: this.name, code: null, signal: null, restarts: this.restarts, error }),
        );
      });
      this.child = null;
      if (!this.running) break;

      log.warn(
        { process: this.name, code: exit.code, signal: exit.signal, err: exit.error },
        'relay_process_exited',
      );
      const decision = this.options.onExit?.(exit) ?? 'retry';
      if (decision === 'exit') {
        this.running = false;
        this.onGiveUp(exit);
        break;
      }

      this.restarts += 1;
      this.sleeper = new AbortController();
      try {
        await wait(this.backoff.next(), this.sleeper.signal);
      } catch (error) {
        if (this.running) log.warn({ err: error }, 'relay_backoff_interrupted');
      } finally {
        this.sleeper = null;
      }
    }
  }
}

/**
 * RTSP path: mediamtx re-serves the stream on the local RTSP port while
 * ffmpeg pulls it from the printer and republishes it unchanged.
 */
export class RtspRelay implements ProxyRunner {
  readonly mode = 'rtsp' as const;
  private configDir: string | null = null;
  private processes: SupervisedProcess[] = [];
  private failed: RelayExit | null = null;

  constructor(private readonly options: RtspRelayOptions) {}

  async start(): Promise<void> {
    if (this.processes.length > 0) return;
    this.configDir = await mkdtemp(path.join(os.tmpdir(), 'chamber-proxy-'));
    const configPath = path.join(this.configDir, 'mediamtx.yml');
    await writeFile(
      configPath,
      buildMediamtxConfig(this.options.bindAddress, this.options.rtspPort),
    );

    const giveUp = (exit: RelayExit): void => {
      if (this.failed) return;
      this.failed = exit;
      log.error({ process: exit.name, code: exit.code }, 'relay_failed');
      this.options.onFatal?.(exit);
    };

    this.processes = [
      new SupervisedProcess('mediamtx', 'mediamtx', [configPath], this.options, giveUp),
      new SupervisedProcess('ffmpeg', 'ffmpeg', buildFfmpegArgs(this.options), this.options, giveUp),
    ];
    for (const child of this.processes) {
      child.start();
    }
    log.info(
      { url: `rtsp://${this.options.credential.username}:<access_code>@${this.options.bindAddress}:${this.options.rtspPort}/stream` },
      'rtsp_relay_started',
    );
  }

  async stop(): Promise<void> {
    await Promise.all(this.processes.map((child) => child.stop()));
    this.processes = [];
    if (this.configDir) {
      await rm(this.configDir, { recursive: true, force: true });
      this.configDir = null;
    }
    log.info('rtsp_relay_stopped');
  }

  status(): Record<string, unknown> {
    return {
      failed: this.failed !== null,
      processes: this.processes.map((child) => ({
        name: child.name,
        pid: child.pid,
        restarts: child.restartCount,
      })),
    };
  }
}
