import test from 'node:test';
import assert from 'node:assert/strict';

import { OpenOptions } from '../src/agent/coordinator';
import { DocumentEventHandlers, HostBridge, routeHostEvent } from '../src/agent/hostBridge';
import { HandlerResult } from '../src/common/types';
import { captureLogger, channelPair } from './helpers';

function recordingHandlers(): DocumentEventHandlers & { calls: string[] } {
  const calls: string[] = [];
  const locking: HandlerResult = { ok: true, action: 'locking' };
  return {
    calls,
    async onOpen(filePath, options?: OpenOptions) {
      calls.push(`open ${filePath} ${options?.imported ?? false}`);
      return locking;
    },
    async onClose(filePath) {
      calls.push(`close ${filePath}`);
      return { ok: true, action: 'unlocking' };
    },
  };
}

test('modeler events reach the coordinator with their import flag', async () => {
  const handlers = recordingHandlers();

  await routeHostEvent({ type: 'modeler/open', payload: { path: 'C:\\a.3dm', imported: true } }, handlers);
  await routeHostEvent({ type: 'modeler/open', payload: { path: 'C:\\b.3dm' } }, handlers);
  await routeHostEvent({ type: 'modeler/close', payload: { path: null } }, handlers);

  assert.deepEqual(handlers.calls, ['open C:\\a.3dm true', 'open C:\\b.3dm false', 'close null']);
});

test('script documents without a file path are skipped', async () => {
  const handlers = recordingHandlers();

  const result = await routeHostEvent({ type: 'script/added', payload: {} }, handlers);
  await routeHostEvent({ type: 'script/removed', payload: { filePath: '/p/facade.gh' } }, handlers);

  assert.deepEqual(result, { ok: true, action: 'skipped' });
  assert.deepEqual(handlers.calls, ['close /p/facade.gh']);
});

test('unknown or malformed events route nowhere', async () => {
  const handlers = recordingHandlers();

  assert.equal(await routeHostEvent({ type: 'modeler/save', payload: {} }, handlers), null);
  assert.equal(await routeHostEvent({ type: 'modeler/open', payload: { path: 7 } }, handlers), null);
  assert.deepEqual(handlers.calls, []);
});

test('the bridge answers each host event with the handler result', async () => {
  const { logger } = captureLogger();
  const bridge = new HostBridge({ pluginName: 'Drive File Locker', logger });
  const [shim, agentSide] = channelPair();
  const handlers = recordingHandlers();
  bridge.attach(agentSide, handlers);

  const answer = shim.nextMessage();
  shim.send(JSON.stringify({ type: 'modeler/open', payload: { path: 'C:\\a.3dm', imported: false } }));

  assert.deepEqual(JSON.parse(await answer), {
    type: 'event/handled',
    payload: { eventType: 'modeler/open', result: { ok: true, action: 'locking' } },
  });
  assert.deepEqual(handlers.calls, ['open C:\\a.3dm false']);
});

test('notifications are broadcast to connected shims with the plug-in prefix', async () => {
  const { logger } = captureLogger();
  const bridge = new HostBridge({ pluginName: 'Drive File Locker', logger });
  const [shim, agentSide] = channelPair();
  bridge.attach(agentSide, recordingHandlers());

  const status = shim.nextMessage();
  bridge.status({ message: 'Locked "model.3dm"' });
  assert.deepEqual(JSON.parse(await status), {
    type: 'notify/status',
    payload: { message: 'Drive File Locker: Locked "model.3dm"' },
  });

  const dialog = shim.nextMessage();
  bridge.dialog({ title: 'Drive File Locker', message: 'File is locked!', icon: 'stop' });
  assert.deepEqual(JSON.parse(await dialog), {
    type: 'notify/dialog',
    payload: { title: 'Drive File Locker', message: 'File is locked!', icon: 'stop' },
  });
});

test('closed shims stop receiving notifications', () => {
  const { logger, lines } = captureLogger();
  const bridge = new HostBridge({ pluginName: 'Drive File Locker', logger });
  const [shim, agentSide] = channelPair();
  bridge.attach(agentSide, recordingHandlers());
  assert.equal(bridge.connectionCount, 1);

  shim.close();
  bridge.status({ message: 'UnLocked "model.3dm"' });

  assert.equal(bridge.connectionCount, 0);
  assert.equal(agentSide.sent.length, 0);
  assert.equal(lines.some((line) => line.msg === 'Drive File Locker: UnLocked "model.3dm"'), true);
});

test('garbage from the shim is logged and ignored', async () => {
  const { logger, lines } = captureLogger();
  const bridge = new HostBridge({ pluginName: 'Drive File Locker', logger });
  const [shim, agentSide] = channelPair();
  const handlers = recordingHandlers();
  bridge.attach(agentSide, handlers);

  shim.send('not json');
  await new Promise((resolve) => setImmediate(resolve));

  assert.deepEqual(handlers.calls, []);
  assert.equal(agentSide.sent.length, 0);
  assert.equal(lines.filter((line) => line.msg === 'unknown host message').length, 1);
});
