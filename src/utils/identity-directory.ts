/**
 * Chat user → ledger identity lookup
 *
 * Linking (the OAuth flow) is owned by another service that writes the
 * mapping; the agent only reads it.
 */

import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { ValidationError } from './errors.js';

import type { ChatUserId, LinkedUser } from '../types.js';

export interface IdentityDirectory {
  lookup(chatUserId: ChatUserId): Promise<LinkedUser | undefined>;
}

/**
 * Fixed mapping, for tests and local runs
 */
export class InMemoryIdentityDirectory implements IdentityDirectory {
  private readonly users: Map<ChatUserId, LinkedUser>;

  constructor(users: LinkedUser[] = []) {
    this.users = new Map(users.map((user) => [user.chatUserId, user]));
  }

  lookup(chatUserId: ChatUserId): Promise<LinkedUser | undefined> {
    return Promise.resolve(this.users.get(chatUserId));
  }
}

const TokenFileSchema = z.record(
  z.object({
    access_token: z.string().min(1),
    splitwise_id: z.number().int(),
    splitwise_name: z.string().nullish(),
  }),
);

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads the token file written by the authorization service.
 * The file is re-read on every lookup so newly linked users are picked up.
 */
export class FileIdentityDirectory implements IdentityDirectory {
  constructor(private readonly path: string) {}

  async lookup(chatUserId: ChatUserId): Promise<LinkedUser | undefined> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch {
      throw new ValidationError(`Identity file ${this.path} is not valid JSON`);
    }

    const parsed = TokenFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Identity file ${this.path} is malformed: ${parsed.error.message}`);
    }

    const entry = parsed.data[chatUserId];
    if (entry === undefined) {
      return undefined;
    }

    return {
      chatUserId,
      ledgerUserId: entry.splitwise_id,
      accessToken: entry.access_token,
      displayName: entry.splitwise_name ?? 'Me',
    };
  }
}
