import { Router, Request, Response } from 'express';
import { getChainId, isTestnet } from '../config/network.js';
import type { KeyValueStore } from '../db/client.js';

export const API_VERSION = '1.0.0';

export function createSystemRoutes(store: KeyValueStore, network: string): Router {
  const router = Router();

  /**
   * GET /health
   * Storage status and the payment network the server is configured for
   */
  router.get('/health', (_req: Request, res: Response) => {
    const connected = store.isOpen();
    res.json({
      status: connected ? 'healthy' : 'degraded',
      network,
      chain_id: getChainId(network),
      database: connected ? 'connected' : 'disconnected',
      testnet: isTestnet(network),
    });
  });

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Streamer donations API',
      health: '/health',
      version: API_VERSION,
    });
  });

  return router;
}
