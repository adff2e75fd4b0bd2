import { Socket } from 'node:net';

export interface TcpProbeResult {
  server: string;
  port: number;
  reachable: boolean;
  responseTimeMs: number | null;
  error: string | null;
}

/**
 * Opens and immediately closes a TCP connection to check that the SQL Server
 * port answers
 */
export function probeTcp(server: string, port: number, timeoutMs = 10_000): Promise<TcpProbeResult> {
  return new Promise(resolve => {
    const socket = new Socket();
    const startedAt = performance.now();
    let settled = false;

    const finish = (error: string | null) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve({
        server,
        port,
        reachable: error === null,
        responseTimeMs: error === null ? Math.round((performance.now() - startedAt) * 100) / 100 : null,
        error,
      });
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(null));
    socket.once('timeout', () => finish(`Connection timed out after ${timeoutMs}ms`));
    socket.once('error', (error: Error) => finish(error.message));
    socket.connect(port, server);
  });
}
