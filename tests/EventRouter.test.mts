import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EventRouter, type CommandSink, type StatePublisher } from '../lib/router/EventRouter.mjs';
import { DeviceRegistry } from '../lib/registry/DeviceRegistry.mjs';
import { StateCache } from '../lib/state/StateCache.mjs';
import { ButtonTracker } from '../lib/state/ButtonTracker.mjs';
import { CommandRejected, CommandTimeout } from '../lib/errors.mjs';
import { waitFor, type PublishedMessage } from './helpers/fakes.mjs';
import type { TopologyBodies } from '../lib/messaging/TopologyParser.mjs';
import type {
  BrokerCommand,
  ChannelValue,
  CommandAck,
  CommandValue,
  Diagnostic,
  HubEventSource,
  InboundHubEvent,
  OutboundCommand,
} from '../lib/types.mjs';

const PREFIX = 'prefix';

const topology: TopologyBodies = {
  devices: {
    Devices: [
      { href: '/device/D1', Name: 'Lamp', DeviceType: 'WallSwitch', AssociatedArea: { href: '/area/1' }, LocalZones: [{ href: '/zone/1' }] },
      { href: '/device/D2', Name: 'Ceiling', DeviceType: 'WallDimmer', AssociatedArea: { href: '/area/2' }, LocalZones: [{ href: '/zone/2' }] },
      { href: '/device/R1', Name: 'Remote', DeviceType: 'Pico2Button', AssociatedArea: { href: '/area/1' }, ButtonGroups: [{ href: '/buttongroup/1' }] },
    ],
  },
  areas: {
    Areas: [
      { href: '/area/1', Name: 'area1' },
      { href: '/area/2', Name: 'Living Room' },
    ],
  },
  buttons: { Buttons: [{ href: '/button/1', ButtonNumber: 2, Parent: { href: '/buttongroup/1' } }] },
  occupancyGroups: {},
};

type HubBehaviour = 'ack' | 'timeout' | 'reject' | 'hold';

class StubHub implements CommandSink {
  commands: OutboundCommand[] = [];
  behaviour: HubBehaviour = 'ack';
  release: () => void = () => undefined;

  async sendCommand(command: OutboundCommand): Promise<CommandAck> {
    this.commands.push(command);
    const ack = { deviceId: command.deviceId, channel: command.channel, statusCode: 201 };
    switch (this.behaviour) {
      case 'timeout':
        throw new CommandTimeout('No acknowledgement within 20ms');
      case 'reject':
        throw new CommandRejected(400);
      case 'hold':
        await new Promise<void>((resolve) => {
          this.release = resolve;
        });
        return ack;
      case 'ack':
        return ack;
    }
  }
}

class RecordingBroker implements StatePublisher {
  published: PublishedMessage[] = [];

  publish(topic: string, payload: string, retained: boolean): void {
    this.published.push({ topic, payload, retain: retained });
  }
}

async function setup(buttonTracker?: ButtonTracker) {
  const registry = new DeviceRegistry();
  await registry.load({ readTopology: async () => topology });
  const cache = new StateCache();
  const hub = new StubHub();
  const broker = new RecordingBroker();
  const router = new EventRouter({ registry, cache, hub, broker, topicPrefix: PREFIX, buttonTracker });
  const diagnostics: Diagnostic[] = [];
  router.setOnDiagnostic((diagnostic) => diagnostics.push(diagnostic));
  return { registry, cache, hub, broker, router, diagnostics };
}

function event(
  deviceId: string,
  value: ChannelValue,
  observedAt: number,
  channel: number = 1,
  source: HubEventSource = 'hub-push'
): InboundHubEvent {
  return { deviceId, channel, value, source, observedAt };
}

function command(area: string, deviceId: string, channel: number, value: CommandValue): BrokerCommand {
  return { topic: `${PREFIX}/${area}/${deviceId}/${channel}/set`, area, deviceId, channel, value };
}

describe('EventRouter', () => {
  describe('hub events', () => {
    it('publishes a change once and converges on the hub confirmation', async () => {
      const { cache, hub, broker, router } = await setup();

      await router.handleHubEvent(event('D1', true, 100));
      assert.deepEqual(broker.published, [{ topic: 'prefix/area1/D1/1/state', payload: 'ON', retain: true }]);

      await router.handleHubEvent(event('D1', true, 150));
      assert.equal(broker.published.length, 1);

      await router.handleBrokerCommand(command('area1', 'D1', 1, false));
      assert.deepEqual(hub.commands, [{ deviceId: 'D1', channel: 1, value: false, originating: 'mqtt-command' }]);
      assert.equal(cache.get('D1', 1)?.value, true);
      assert.equal(broker.published.length, 1);

      await router.handleHubEvent(event('D1', false, 200, 1, 'command-ack'));
      assert.deepEqual(broker.published[1], { topic: 'prefix/area1/D1/1/state', payload: 'OFF', retain: true });
      assert.equal(cache.get('D1', 1)?.value, false);
    });

    it('slugs the area label in state topics', async () => {
      const { broker, router } = await setup();

      await router.handleHubEvent(event('D2', 42, 100));
      assert.deepEqual(broker.published, [{ topic: 'prefix/living-room/D2/1/state', payload: '42', retain: true }]);
    });

    it('ignores observations older than the cached value', async () => {
      const { broker, router } = await setup();

      await router.handleHubEvent(event('D2', 42, 200));
      await router.handleHubEvent(event('D2', 10, 100));
      assert.equal(broker.published.length, 1);
    });
  });

  describe('broker commands', () => {
    it('reports an unknown device once and does not contact the hub', async () => {
      const { hub, broker, router, diagnostics } = await setup();

      await router.handleBrokerCommand(command('area1', 'D9', 1, true));
      assert.deepEqual(diagnostics, [
        {
          code: 'UNKNOWN_DEVICE_COMMAND',
          message: 'No device D9 in area area1',
          topic: 'prefix/area1/D9/1/set',
          deviceId: 'D9',
        },
      ]);
      assert.equal(hub.commands.length, 0);
      assert.equal(broker.published.length, 0);
    });

    it('treats a device addressed under the wrong area as unknown', async () => {
      const { hub, router, diagnostics } = await setup();

      await router.handleBrokerCommand(command('kitchen', 'D1', 1, true));
      assert.equal(diagnostics.length, 1);
      assert.equal(diagnostics[0]?.code, 'UNKNOWN_DEVICE_COMMAND');
      assert.equal(hub.commands.length, 0);
    });

    it('reports a missing channel', async () => {
      const { router, diagnostics } = await setup();

      await router.handleBrokerCommand(command('area1', 'D1', 2, true));
      assert.equal(diagnostics[0]?.message, 'Device D1 has no channel 2');
    });

    it('reports values that do not apply to the channel', async () => {
      const { hub, router, diagnostics } = await setup();

      await router.handleBrokerCommand(command('area1', 'D1', 1, 'STOP'));
      await router.handleBrokerCommand(command('area1', 'R1', 2, true));
      assert.deepEqual(
        diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.message]),
        [
          ['MALFORMED_COMMAND', 'STOP does not apply to switch channel 1'],
          ['MALFORMED_COMMAND', 'true does not apply to button channel 2'],
        ]
      );
      assert.equal(hub.commands.length, 0);
    });

    it('reports a command the hub never acknowledged', async () => {
      const { cache, hub, router, diagnostics } = await setup();
      hub.behaviour = 'timeout';

      await router.handleBrokerCommand(command('living-room', 'D2', 1, 80));
      assert.deepEqual(diagnostics, [
        {
          code: 'COMMAND_TIMEOUT',
          message: 'No acknowledgement within 20ms',
          topic: 'prefix/living-room/D2/1/set',
          deviceId: 'D2',
        },
      ]);
      assert.equal(cache.get('D2', 1), undefined);
    });

    it('reports a command the hub refused', async () => {
      const { hub, router, diagnostics } = await setup();
      hub.behaviour = 'reject';

      await router.handleBrokerCommand(command('living-room', 'D2', 1, 80));
      assert.equal(diagnostics[0]?.code, 'COMMAND_FAILED');
      assert.equal(diagnostics[0]?.message, 'Hub rejected the command with status 400');
    });

    it('keeps handling hub events while an acknowledgement is pending', async () => {
      const { hub, broker, router } = await setup();
      hub.behaviour = 'hold';

      const pending = router.handleBrokerCommand(command('area1', 'D1', 1, true));
      await waitFor(() => hub.commands.length === 1);

      await router.handleHubEvent(event('D2', 30, 100));
      assert.equal(broker.published.length, 1);

      hub.release();
      await pending;
      await router.drain();
    });
  });

  describe('synchronize', () => {
    it('publishes only changed values without forceRefresh', async () => {
      const { broker, router } = await setup();

      assert.equal(await router.synchronize([event('D1', true, 100), event('D2', 50, 100)], { forceRefresh: false }), 2);
      assert.equal(await router.synchronize([event('D1', true, 200), event('D2', 50, 200)], { forceRefresh: false }), 0);
      assert.equal(broker.published.length, 2);
    });

    it('publishes every cached value exactly once with forceRefresh', async () => {
      const { broker, router } = await setup();
      await router.handleHubEvent(event('D1', true, 100));
      await router.handleHubEvent(event('D2', 50, 100));
      broker.published = [];

      const count = await router.synchronize([event('D2', 70, 200)], { forceRefresh: true });
      assert.equal(count, 2);
      assert.deepEqual(broker.published, [
        { topic: 'prefix/area1/D1/1/state', payload: 'ON', retain: true },
        { topic: 'prefix/living-room/D2/1/state', payload: '70', retain: true },
      ]);
    });

    it('republishes the whole cache', async () => {
      const { broker, router } = await setup();
      await router.synchronize([event('D1', false, 100), event('D2', 5, 100)], { forceRefresh: false });
      broker.published = [];

      assert.equal(await router.republishAll(), 2);
      assert.deepEqual(
        broker.published.map((message) => `${message.topic}=${message.payload}`),
        ['prefix/area1/D1/1/state=OFF', 'prefix/living-room/D2/1/state=5']
      );
    });

    it('forgets cached values of devices a registry reload dropped', async () => {
      const { registry, broker, router } = await setup();
      await router.synchronize([event('D1', false, 100), event('D2', 5, 100)], { forceRefresh: false });
      await registry.load({
        readTopology: async () => ({
          ...topology,
          devices: {
            Devices: [
              { href: '/device/D1', Name: 'Lamp', DeviceType: 'WallSwitch', AssociatedArea: { href: '/area/1' }, LocalZones: [{ href: '/zone/1' }] },
            ],
          },
        }),
      });
      broker.published = [];

      assert.equal(await router.pruneUnregistered(), 1);
      assert.equal(await router.republishAll(), 1);
      assert.deepEqual(broker.published, [{ topic: 'prefix/area1/D1/1/state', payload: 'OFF', retain: true }]);
    });
  });

  describe('button gestures', () => {
    it('publishes a single press as a transient action', async () => {
      const tracker = new ButtonTracker({ doublePressWindow: 20, longPressMax: 200 });
      const { broker, router } = await setup(tracker);

      await router.handleHubEvent(event('R1', 'PRESS', 100, 2));
      await router.handleHubEvent(event('R1', 'RELEASE', 110, 2));
      await waitFor(() => broker.published.some((message) => message.topic.endsWith('/action')));

      assert.deepEqual(broker.published, [
        { topic: 'prefix/area1/R1/2/state', payload: 'PRESS', retain: true },
        { topic: 'prefix/area1/R1/2/state', payload: 'RELEASE', retain: true },
        { topic: 'prefix/area1/R1/2/action', payload: 'single', retain: false },
      ]);
      router.dispose();
    });
  });
});
