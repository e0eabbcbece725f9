/**
 * Finished-game records
 */

import mongoose from 'mongoose';
import { GameResult } from '../game/types';
import { storeLogger } from '../utils/logger';

export interface IResultStore {
  saveResult(result: GameResult): Promise<void>;
  close(): Promise<void>;
}

const GameRecordSchema = new mongoose.Schema({
  winner: { type: String, default: null },
  reason: String,
  envelope: {
    suspect: String,
    weapon: String,
    room: String,
  },
  turnsPlayed: Number,
  players: [{ id: String, agent: String, isOut: Boolean, _id: false }],
  finishedAt: { type: Date, default: Date.now },
});

const GameRecord = mongoose.models.GameRecord ?? mongoose.model('GameRecord', GameRecordSchema);

/**
 * Stores results in MongoDB. Connects lazily on the first save.
 */
export class MongoResultStore implements IResultStore {
  private uri: string;
  private connected = false;

  constructor(uri: string) {
    this.uri = uri;
  }

  private async connect(): Promise<void> {
    if (this.connected) return;
    await mongoose.connect(this.uri, { serverSelectionTimeoutMS: 5000 });
    this.connected = true;
    storeLogger.info('Connected to MongoDB');
  }

  async saveResult(result: GameResult): Promise<void> {
    await this.connect();
    await GameRecord.create({
      winner: result.winner,
      reason: result.reason,
      envelope: {
        suspect: result.envelope.suspect.name,
        weapon: result.envelope.weapon.name,
        room: result.envelope.room.name,
      },
      turnsPlayed: result.turnsPlayed,
      players: result.players,
    });
    storeLogger.info({ winner: result.winner, reason: result.reason }, 'Game result saved to MongoDB');
  }

  async close(): Promise<void> {
    if (this.connected) {
      await mongoose.connection.close();
      this.connected = false;
    }
  }
}

export function createResultStore(mongoUri: string | undefined): IResultStore | null {
  return mongoUri ? new MongoResultStore(mongoUri) : null;
}
