import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ValidationError } from '../errors.js';
import { FileIdentityDirectory, InMemoryIdentityDirectory } from '../identity-directory.js';
import { linkedUser } from './fakes.js';

describe('InMemoryIdentityDirectory', () => {
  it('finds linked users by chat id', async () => {
    const directory = new InMemoryIdentityDirectory([linkedUser()]);

    expect(await directory.lookup('inbox-asha')).toEqual(linkedUser());
    expect(await directory.lookup('inbox-nobody')).toBeUndefined();
  });
});

describe('FileIdentityDirectory', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'identities-'));
    file = join(dir, 'user_tokens.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the token file', async () => {
    await writeFile(
      file,
      JSON.stringify({
        'inbox-asha': { access_token: 'test-token', splitwise_id: 1, splitwise_name: 'Asha' },
        'inbox-ravi': { access_token: 'test-token-2', splitwise_id: 7 },
      }),
    );
    const directory = new FileIdentityDirectory(file);

    expect(await directory.lookup('inbox-asha')).toEqual(linkedUser());
    expect(await directory.lookup('inbox-ravi')).toEqual({
      chatUserId: 'inbox-ravi',
      ledgerUserId: 7,
      accessToken: 'test-token-2',
      displayName: 'Me',
    });
    expect(await directory.lookup('inbox-nobody')).toBeUndefined();
  });

  it('picks up users linked after startup', async () => {
    const directory = new FileIdentityDirectory(file);
    expect(await directory.lookup('inbox-asha')).toBeUndefined();

    await writeFile(file, JSON.stringify({ 'inbox-asha': { access_token: 'test-token', splitwise_id: 1 } }));

    expect((await directory.lookup('inbox-asha'))?.ledgerUserId).toBe(1);
  });

  it('rejects a malformed file', async () => {
    await writeFile(file, JSON.stringify({ 'inbox-asha': { access_token: 'test-token' } }));
    await expect(new FileIdentityDirectory(file).lookup('inbox-asha')).rejects.toBeInstanceOf(ValidationError);

    await writeFile(file, '{ not json');
    await expect(new FileIdentityDirectory(file).lookup('inbox-asha')).rejects.toThrow('is not valid JSON');
  });
});
