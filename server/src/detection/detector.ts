import tls from 'node:tls';
import { logger } from '../lib/logger.js';
import { CHAMBER_IMAGE_PORT, RTSP_PORT } from '../protocol/constants.js';
import type { CameraProtocol } from '../types.js';

export interface DetectionOptions {
  chamberPort?: number;
  rtspPort?: number;
  timeoutMs?: number;
  probe?: (host: string, port: number, timeoutMs: number) => Promise<boolean>;
}

const log = logger.child({ component: 'detector' });

/** True when `host:port` completes a TLS handshake within the timeout. */
export function probeTls(host: string, port: number, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    let settled = false;
    const socket = tls.connect({ host, port, rejectUnauthorized: false });

    const finish = (ok: boolean): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(ok);
    };

    const timer = setTimeout(() => finish(false), timeoutMs);
    socket.once('secureConnect', () => finish(true));
    socket.on('error', (error) => {
      log.debug({ host, port, err: error }, 'probe_failed');
      finish(false);
    });
    socket.once('close', () => finish(false));
  });
}

/**
 * Works out which camera service the printer exposes. The chamber-image
 * port wins when both answer.
 */
export async function detectCameraProtocol(
  host: string,
  options: DetectionOptions = {},
): Promise<CameraProtocol> {
  const chamberPort = options.chamberPort ?? CHAMBER_IMAGE_PORT;
  const rtspPort = options.rtspPort ?? RTSP_PORT;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const probe = options.probe ?? probeTls;

  if (await probe(host, chamberPort, timeoutMs)) {
    log.info({ host, port: chamberPort }, 'camera_detected_chamber_image');
    return 'chamber_image';
  }
  if (await probe(host, rtspPort, timeoutMs)) {
    log.info({ host, port: rtspPort }, 'camera_detected_rtsp');
    return 'rtsp';
  }
  log.error({ host, chamberPort, rtspPort }, 'camera_not_detected');
  return 'unknown';
}
