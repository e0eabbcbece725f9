/**
 * Status and Metrics Server
 */

import express, { Request, Response, Application } from 'express';
import { healthLogger } from '../utils/logger';
import { GameStatus } from '../game/controller';
import { TurnPhase } from '../game/types';

interface HealthStatus extends GameStatus {
  status: 'ok' | 'finished';
  uptime: number;
  timestamp: string;
}

type StatusCallback = () => GameStatus;

/**
 * Prometheus text for the current game
 */
export function formatMetrics(status: GameStatus, uptimeSeconds: number): string {
  return [
    '# HELP whodunit_turns_total Turns played in the current game',
    '# TYPE whodunit_turns_total counter',
    `whodunit_turns_total ${status.turnsPlayed}`,
    '',
    '# HELP whodunit_players_active Players still in the game',
    '# TYPE whodunit_players_active gauge',
    `whodunit_players_active ${status.playersActive}`,
    '',
    '# HELP whodunit_players_out Players eliminated by a wrong accusation',
    '# TYPE whodunit_players_out gauge',
    `whodunit_players_out ${status.playersOut}`,
    '',
    '# HELP whodunit_uptime_seconds Server uptime in seconds',
    '# TYPE whodunit_uptime_seconds counter',
    `whodunit_uptime_seconds ${uptimeSeconds}`,
    '',
    '# HELP whodunit_game_phase Current turn phase (label)',
    '# TYPE whodunit_game_phase gauge',
    `whodunit_game_phase{phase="${status.phase}"} 1`,
  ].join('\n');
}

export class HealthServer {
  private app: Application;
  private server: ReturnType<Application['listen']> | null = null;
  private startTime: number = Date.now();
  private port: number;
  private getStatus: StatusCallback;

  constructor(port: number, getStatus: StatusCallback) {
    this.app = express();
    this.port = port;
    this.getStatus = getStatus;
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      try {
        const game = this.getStatus();
        const health: HealthStatus = {
          ...game,
          status: game.phase === TurnPhase.WIN || game.phase === TurnPhase.GAME_OVER ? 'finished' : 'ok',
          uptime: this.getUptime(),
          timestamp: new Date().toISOString(),
        };
        res.status(200).json(health);
      } catch (error) {
        healthLogger.error({ error }, 'Health check failed');
        res.status(503).json({
          status: 'error',
          error: 'Health check failed',
          timestamp: new Date().toISOString(),
        });
      }
    });

    // Liveness probe (simple)
    this.app.get('/live', (_req: Request, res: Response) => {
      res.status(200).send('OK');
    });

    this.app.get('/metrics', (_req: Request, res: Response) => {
      try {
        res.set('Content-Type', 'text/plain; version=0.0.4');
        res.send(formatMetrics(this.getStatus(), Math.floor(this.getUptime() / 1000)));
      } catch (error) {
        healthLogger.error({ error }, 'Metrics generation failed');
        res.status(500).send('# Error generating metrics');
      }
    });
  }

  start(): void {
    this.server = this.app.listen(this.port, () => {
      healthLogger.info({ port: this.port }, 'Status server started');
    });
  }

  stop(): void {
    if (this.server) {
      this.server.close();
      this.server = null;
      healthLogger.info('Status server stopped');
    }
  }

  getUptime(): number {
    return Date.now() - this.startTime;
  }
}
