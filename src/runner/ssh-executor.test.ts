import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import type { SshTransportConfig } from './executor-interface.js';
import { SSHExecutor } from './ssh-executor.js';
import { collectingSink } from '../testing/fakes.js';

// Stand-in for ssh: drops the options, prints to both streams, and exits 0
// only for the host named "good". "sleepy" hangs so timeouts can fire;
// "chatty" keeps printing after a pause.
const FAKE_SSH = `#!/bin/sh
while [ $# -gt 2 ]; do shift; done
host=$1
cmd=$2
if [ "$host" = "sleepy" ]; then exec sleep 5; fi
if [ "$host" = "chatty" ]; then echo first; sleep 1; echo second; exit 0; fi
echo "out:$host:$cmd"
echo "err:$host" 1>&2
if [ "$host" = "good" ]; then exit 0; fi
exit 255
`;

describe('runner/ssh-executor', () => {
  let dir: string;
  let fakeSsh: string;

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ssh-executor-'));
    fakeSsh = path.join(dir, 'ssh');
    fs.writeFileSync(fakeSsh, FAKE_SSH, { mode: 0o755 });
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function config(overrides: Partial<SshTransportConfig> = {}): SshTransportConfig {
    return { type: 'ssh', binary: fakeSsh, connectTimeoutSeconds: 2, options: [], ...overrides };
  }

  it('builds ssh arguments with the connection timeout first', () => {
    const executor = new SSHExecutor(config({
      user: 'deploy',
      port: 2222,
      keyPath: '/keys/id',
      connectTimeoutSeconds: 3,
      options: ['StrictHostKeyChecking=no'],
    }));

    assert.deepEqual(executor.buildArgs('web-1', 'uptime'), [
      '-o', 'ConnectTimeout=3',
      '-o', 'BatchMode=yes',
      '-o', 'StrictHostKeyChecking=no',
      '-p', '2222',
      '-i', '/keys/id',
      'deploy@web-1',
      'uptime',
    ]);
  });

  it('keeps a user already named in the host', () => {
    const executor = new SSHExecutor(config({ user: 'deploy' }));
    assert.deepEqual(executor.buildArgs('root@db', 'ls').slice(-2), ['root@db', 'ls']);
  });

  it('streams stdout and stderr into the sink and reports success', async () => {
    const { sink, text } = collectingSink();
    const outcome = await new SSHExecutor(config()).execute('echo hi', 'good', sink);

    assert.deepEqual(outcome, { status: 'success' });
    assert.deepEqual(text().split('\n').filter(Boolean).sort(), ['err:good', 'out:good:echo hi']);
  });

  it('reports a nonzero exit as a failure', async () => {
    const { sink, text } = collectingSink();
    const outcome = await new SSHExecutor(config()).execute('true', 'unreachable', sink);

    assert.deepEqual(outcome, { status: 'failure', detail: 'exit status 255', exitCode: 255 });
    assert.ok(text().includes('out:unreachable:true'));
  });

  it('reports a transport that cannot be launched', async () => {
    const { sink } = collectingSink();
    const missing = path.join(dir, 'no-such-ssh');
    const outcome = await new SSHExecutor(config({ binary: missing })).execute('true', 'good', sink);

    assert.equal(outcome.status, 'failure');
    assert.equal(outcome.status === 'failure' && outcome.exitCode, null);
    assert.ok(outcome.status === 'failure' && outcome.detail.startsWith(`failed to launch ${missing}:`));
  });

  it('kills a command that outlives the command timeout', async () => {
    const { sink } = collectingSink();
    const executor = new SSHExecutor(config({ commandTimeoutSeconds: 1 }));
    const outcome = await executor.execute('true', 'sleepy', sink);

    assert.equal(outcome.status, 'failure');
    assert.ok(outcome.status === 'failure' && outcome.detail === `${fakeSsh} command timed out after 1s`);
  });

  it('stops the command and reports failure when the sink cannot take output', async () => {
    const errors: Error[] = [];
    const sink = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('disk full'));
      },
    });
    sink.on('error', err => errors.push(err));

    const outcome = await new SSHExecutor(config()).execute('true', 'chatty', sink);

    assert.equal(outcome.status, 'failure');
    assert.ok(outcome.status === 'failure' && outcome.detail === 'could not write output: disk full');
    assert.deepEqual(errors.map(e => e.message), ['disk full']);
  });
});
