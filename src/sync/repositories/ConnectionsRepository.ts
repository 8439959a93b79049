/**
 * ConnectionsRepository
 *
 * Repository for connections between users. A connection is owned by the
 * user who sent the request and lives only in the public partition, where
 * both parties can read it and the recipient can accept it.
 */

import { connectionSchema, nowIso, type Connection, type ConnectionInput } from '@/lib/types';
import type { SyncService } from '../services/SyncService';
import type { PullResult } from '../types';
import { BaseRepository, type RepositoryOptions } from './BaseRepository';

export class ConnectionsRepository extends BaseRepository<Connection, ConnectionInput> {
  constructor(syncService: SyncService, options: RepositoryOptions = {}) {
    super('connection', connectionSchema, syncService, { ...options, images: null });
  }

  protected normalize(connection: Connection): Connection {
    return { ...connection, ownerId: connection.fromUserId, visibility: 'public' };
  }

  // ============ Entity-Specific Queries ============

  /**
   * Connections the user sent or received, in any status.
   */
  async fetchForUser(userId: string): Promise<Connection[]> {
    const connections = await this.fetchAll();
    return connections.filter((c) => c.fromUserId === userId || c.toUserId === userId);
  }

  async fetchAccepted(userId: string): Promise<Connection[]> {
    const connections = await this.fetchForUser(userId);
    return connections.filter((c) => c.status === 'accepted');
  }

  async fetchSentRequests(userId: string): Promise<Connection[]> {
    return this.query({ fromUserId: userId, status: 'pending' });
  }

  async fetchReceivedRequests(userId: string): Promise<Connection[]> {
    return this.query({ toUserId: userId, status: 'pending' });
  }

  /**
   * The connection between two users, whichever of them sent it.
   */
  async findBetween(userA: string, userB: string): Promise<Connection | null> {
    const connections = await this.fetchForUser(userA);
    return (
      connections.find(
        (c) =>
          (c.fromUserId === userA && c.toUserId === userB) || (c.fromUserId === userB && c.toUserId === userA)
      ) ?? null
    );
  }

  async areConnected(userA: string, userB: string): Promise<boolean> {
    const connection = await this.findBetween(userA, userB);
    return connection?.status === 'accepted';
  }

  // ============ Entity-Specific Writes ============

  async accept(id: string): Promise<Connection> {
    const connection = await this.require(id);
    if (connection.status === 'accepted') {
      return connection;
    }
    return this.update({ ...connection, status: 'accepted' });
  }

  // ============ Sync ============

  /**
   * Pull the connections the user sent and the ones addressed to them.
   */
  async syncDown(ownerId: string, since: string | null = null): Promise<PullResult> {
    const sent = await this.remote.fetchRecords('public', this.kind, { ownerId, since });
    const received = await this.remote.fetchRecords('public', this.kind, {
      since,
      payloadEquals: { toUserId: ownerId },
    });
    return this.pull([...sent, ...received], 'public');
  }

  /**
   * Either party may write the shared record, so there is no private copy.
   */
  protected async pushEntity(connection: Connection): Promise<void> {
    const saved = await this.remote.saveRecord('public', this.kind, this.toRemoteRecord(connection, null, null));
    await this.syncState.update(this.kind, connection.id, {
      remoteRecordId: saved.recordId,
      publicRecordId: saved.recordId,
      lastSyncedAt: nowIso(),
    });
  }

  protected async pushDeletion(id: string): Promise<void> {
    if (await this.localDataSource.exists(id)) return;

    await this.remote.deleteRecord('public', this.kind, id);
    await this.syncState.remove(this.kind, id);
  }
}
