import type http from 'node:http';
import { ChamberImageProxy } from './chamber/proxy.js';
import { loadConfig, type ProxyConfig } from './config.js';
import { detectCameraProtocol } from './detection/detector.js';
import { FtpProxy } from './ftp/ftpProxy.js';
import { createStatusApp, startStatusServer } from './http/statusServer.js';
import { loadTlsMaterial } from './lib/certificates.js';
import { DetectionError } from './lib/errors.js';
import { requireExecutables, type ExecutableLookup } from './lib/executables.js';
import type { FanOutHub } from './lib/fanOutHub.js';
import { logger } from './lib/logger.js';
import { RtspRelay } from './rtsp/relay.js';
import type { CameraProtocol, ProxyRunner } from './types.js';

interface StartedRunner {
  runner: ProxyRunner;
  hub?: FanOutHub;
}

type RunnerFactory = (
  config: ProxyConfig,
  fail: () => void,
  lookup?: ExecutableLookup,
) => Promise<StartedRunner>;

/** One statically typed handler per detected camera protocol. */
export const runnerFactories: Record<Exclude<CameraProtocol, 'unknown'>, RunnerFactory> = {
  chamber_image: async (config, _fail, lookup) => {
    // openssl is only needed when the listener certificate has to be generated.
    if ('certDir' in config.tls) {
      await requireExecutables(['openssl'], lookup);
    }
    const tlsMaterial = await loadTlsMaterial(config.tls);
    const proxy = new ChamberImageProxy(config, tlsMaterial);
    return { runner: proxy, hub: proxy.hub };
  },
  rtsp: async (config, fail, lookup) => {
    await requireExecutables(['ffmpeg', 'mediamtx'], lookup);
    return {
      runner: new RtspRelay({
        printerIp: config.printerIp,
        credential: config.credential,
        bindAddress: config.bindAddress,
        rtspPort: config.rtspPort,
        backoff: config.backoff,
        onFatal: fail,
      }),
    };
  },
};

export async function run(env: Record<string, string | undefined>): Promise<void> {
  const config = loadConfig(env);

  logger.info({ printer: config.printerIp }, 'detecting_camera');
  const mode = await detectCameraProtocol(config.printerIp, {
    chamberPort: config.chamberPort,
    rtspPort: config.rtspPort,
    timeoutMs: config.connectTimeoutMs,
  });
  if (mode === 'unknown') {
    throw new DetectionError(
      `No camera service answered on ${config.printerIp} (ports ${config.chamberPort}, ${config.rtspPort}); ` +
        'check the printer IP, the access code and that LAN mode is enabled',
    );
  }

  let shuttingDown = false;
  let statusServer: http.Server | null = null;
  let ftpProxy: FtpProxy | null = null;

  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ exitCode }, 'shutting_down');
    await runner.stop();
    await ftpProxy?.stop();
    if (statusServer) {
      statusServer.closeAllConnections();
      await new Promise<void>((resolve) => statusServer?.close(() => resolve()));
    }
    logger.info('shutdown_complete');
    process.exit(exitCode);
  };

  const requestShutdown = (exitCode: number): void => {
    shutdown(exitCode).catch((error: unknown) => {
      logger.fatal({ err: error }, 'shutdown_failed');
      process.exit(1);
    });
  };

  const { runner, hub } = await runnerFactories[mode](config, () => requestShutdown(1));
  await runner.start();

  if (config.ftpProxyEnabled) {
    ftpProxy = new FtpProxy({
      printerIp: config.printerIp,
      bindAddress: config.bindAddress,
      connectTimeoutMs: config.connectTimeoutMs,
    });
    await ftpProxy.start();
  }

  if (config.statusPort > 0) {
    const app = createStatusApp({ runner, hub, corsOrigins: config.corsOrigins });
    statusServer = await startStatusServer(app, config.statusPort, config.bindAddress);
  }

  logger.info({ mode, printer: config.printerIp, bind: config.bindAddress }, 'proxy_running');

  process.on('SIGINT', () => requestShutdown(0));
  process.on('SIGTERM', () => requestShutdown(0));
}
