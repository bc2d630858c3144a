import { PickupKind } from '../../shared/types.js';

export type DeathCause = 'wall' | 'self' | 'player' | 'bullet' | 'explosion';

export type EngineEvent =
  | { type: 'playerSpawned'; playerId: string; name: string }
  | {
      type: 'playerDied';
      playerId: string;
      name: string;
      cause: DeathCause;
      score: number;
      killerId?: string;
    }
  | { type: 'playerLeftGame'; playerId: string; name: string; score: number }
  | { type: 'bodyHit'; playerId: string; removed: number; byId: string }
  | { type: 'pickupCollected'; playerId: string; kind: PickupKind }
  | { type: 'bombExploded'; ownerId: string; x: number; y: number };
