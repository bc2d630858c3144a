import { Router, Request, Response } from 'express';
import { GameServer } from '../gameServer.js';

export function createRoutes(server: GameServer): Router {
  const router = Router();

  // GET /api/status - live counts for dashboards and health checks
  router.get('/status', (req: Request, res: Response) => {
    res.json(server.getStatus());
  });

  // GET /api/leaderboard - top players by highscore plus the all-time record
  router.get('/leaderboard', (req: Request, res: Response) => {
    res.json(server.getLeaderboard());
  });

  return router;
}
