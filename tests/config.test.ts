import { describe, it, after } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import { writeFile } from 'fs/promises';

import { loadConfig } from '../config';
import { DecodeError } from '../errors';
import { removeDir, tmpDir } from './helpers';

describe('loadConfig', () => {
  const dirs: string[] = [];

  const configDir = async (config: unknown) => {
    const dir = await tmpDir('config');
    dirs.push(dir);
    await writeFile(path.join(dir, '.irhubrc.json'), JSON.stringify(config));
    return dir;
  };

  after(async () => {
    for (const dir of dirs) await removeDir(dir);
  });

  it('decodes a remote files config', async () => {
    const dir = await configDir({
      backend: 'remoteFiles',
      remotesDirectory: '/srv/remotes',
      api: { port: 9000 },
    });

    assert.deepStrictEqual(await loadConfig(dir), {
      backend: 'remoteFiles',
      remotesDirectory: '/srv/remotes',
      api: { port: 9000 },
    });
  });

  it('decodes a lirc config', async () => {
    const dir = await configDir({ backend: 'lirc', lircSocket: '/run/lirc/lircd' });

    assert.deepStrictEqual(await loadConfig(dir), { backend: 'lirc', lircSocket: '/run/lirc/lircd' });
  });

  it('rejects unknown back-ends', async () => {
    const dir = await configDir({ backend: 'bluetooth' });

    await assert.rejects(loadConfig(dir), DecodeError);
  });

  it('rejects mistyped settings', async () => {
    const dir = await configDir({ backend: 'lirc', api: { port: '8090' } });

    await assert.rejects(loadConfig(dir), DecodeError);
  });
});
