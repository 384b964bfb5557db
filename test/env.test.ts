import assert from 'node:assert/strict';
import test from 'node:test';

import { parseEnv, resolveCommandGuilds } from '../src/utils/env.js';

const baseEnv = { DISCORD_TOKEN: 'test-token', DISCORD_CLIENT_ID: '1000' };

test('env: applies defaults', () => {
  const env = parseEnv(baseEnv);
  assert.equal(env.PARTICIPANT_ROLE_ID, 0n);
  assert.equal(env.SPECTATOR_ROLE_ID, 0n);
  assert.equal(env.ALLOWED_ROLE_ID, 0n);
  assert.deepEqual(env.GUILD_IDS, []);
  assert.equal(env.FONT_SCALE, 1);
  assert.equal(env.FONT_URL, undefined);
  assert.equal(env.HISTORY_CSV_PATH, 'data/history.csv');
  assert.equal(env.ATTENDANCE_STORAGE_PATH, undefined);
  assert.equal(env.LOG_LEVEL, 'info');
});

test('env: parses role ids as bigint', () => {
  const env = parseEnv({ ...baseEnv, PARTICIPANT_ROLE_ID: ' 123456789012345678 ', ALLOWED_ROLE_ID: '' });
  assert.equal(env.PARTICIPANT_ROLE_ID, 123456789012345678n);
  assert.equal(env.ALLOWED_ROLE_ID, 0n);
});

test('env: rejects invalid values', () => {
  assert.throws(() => parseEnv({ DISCORD_CLIENT_ID: '1000' }), /Invalid environment configuration/);
  assert.throws(() => parseEnv({ ...baseEnv, SPECTATOR_ROLE_ID: 'abc' }), /Invalid environment configuration/);
  assert.throws(() => parseEnv({ ...baseEnv, FONT_URL: 'not a url' }), /Invalid environment configuration/);
  assert.throws(() => parseEnv({ ...baseEnv, BACKGROUND_ALPHA: '300' }), /Invalid environment configuration/);
});

test('env: blank optional text is treated as unset', () => {
  const env = parseEnv({ ...baseEnv, FONT_URL: '  ', DEFAULT_BG_IMAGE_URL: '' });
  assert.equal(env.FONT_URL, undefined);
  assert.equal(env.DEFAULT_BG_IMAGE_URL, undefined);
});

test('env: normalises the log level', () => {
  assert.equal(parseEnv({ ...baseEnv, LOG_LEVEL: ' WARN ' }).LOG_LEVEL, 'warn');
});

test('env: merges command guilds without duplicates', () => {
  const env = parseEnv({ ...baseEnv, GUILD_IDS: '1, 2,x,2', DISCORD_GUILD_ID: '3' });
  assert.deepEqual(resolveCommandGuilds(env), ['1', '2', '3']);
  assert.deepEqual(resolveCommandGuilds(parseEnv(baseEnv)), []);
});
