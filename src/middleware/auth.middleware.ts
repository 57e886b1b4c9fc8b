import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { clerkClient } from '@clerk/clerk-sdk-node';
import type { UserService } from '../services/user.service';
import { AuthenticationError } from '../utils/errors';

const DB_SYNC_TTL = 30 * 60 * 1000; // 30 minutes

const bearerToken = (req: Request): string | null => {
  const header = req.get('authorization');
  if (!header?.startsWith('Bearer ')) return null;
  const token = header.slice('Bearer '.length).trim();
  return token || null;
};

/**
 * Verifies the Clerk session token and mirrors the Clerk user into the users
 * table, at most once per DB_SYNC_TTL per user.
 */
export const createRequireAuth = (users: UserService): RequestHandler => {
  const lastSyncAt = new Map<string, number>();

  const shouldSyncWithDB = (userId: string): boolean => {
    const now = Date.now();
    const last = lastSyncAt.get(userId);
    if (last !== undefined && now - last <= DB_SYNC_TTL) return false;
    lastSyncAt.set(userId, now);
    return true;
  };

  const syncUser = async (userId: string): Promise<void> => {
    const clerkUser = await clerkClient.users.getUser(userId);
    await users.upsert({
      id: clerkUser.id,
      username: clerkUser.username || `user_${clerkUser.id.substring(0, 8)}`,
      email: clerkUser.emailAddresses[0]?.emailAddress ?? null,
      firstName: clerkUser.firstName ?? '',
      lastName: clerkUser.lastName ?? '',
    });
  };

  const authenticate = async (req: Request): Promise<string> => {
    const token = bearerToken(req);
    if (!token) {
      throw new AuthenticationError('Missing bearer token');
    }

    let userId: string;
    try {
      ({ sub: userId } = await clerkClient.verifyToken(token));
    } catch (error) {
      console.error('[auth] token verification failed:', error);
      throw new AuthenticationError('Invalid token');
    }

    if (shouldSyncWithDB(userId)) {
      try {
        await syncUser(userId);
      } catch (error) {
        // The request can still go through; messages to/from an unsynced user fail on lookup.
        lastSyncAt.delete(userId);
        console.error('[auth] error syncing user with database:', error);
      }
    }

    return userId;
  };

  return (req: Request, _res: Response, next: NextFunction) => {
    authenticate(req)
      .then((userId) => {
        req.userId = userId;
        next();
      })
      .catch(next);
  };
};
