import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { COMMANDS } from '../src/device/catalog.js';
import { LinkplayClient } from '../src/device/client.js';
import { DeviceError, InvalidArgumentError, ProtocolError } from '../src/errors.js';
import { DeviceStub, stubClient } from './helpers.js';

describe('LinkplayClient volume', () => {
  it('sets and reads back the volume for 192.168.1.55', async () => {
    const { client, stub } = stubClient();

    assert.equal(await client.volume(100), true);
    assert.deepEqual(stub.calls, ['setPlayerCmd:vol:100']);
    assert.deepEqual(stub.hosts, ['192.168.1.55']);

    stub.reply('getPlayerStatus', '100');
    assert.equal(await client.volume(), 100);
  });

  it('round-trips every level through the player status', async () => {
    const { client } = stubClient();
    for (const level of [0, 1, 49, 100]) {
      await client.volume(level);
      assert.equal(await client.volume(), level);
    }
  });

  it('rejects out-of-range levels without touching the network', async () => {
    for (const level of [-1, 101, 150, NaN]) {
      const { client, stub } = stubClient();
      await assert.rejects(client.volume(level), InvalidArgumentError);
      assert.equal(stub.calls.length, 0);
    }
  });

  it('clamps relative changes', async () => {
    const { client, stub } = stubClient();
    stub.volume = 98;
    assert.equal(await client.volumeUp(), 100);
    assert.deepEqual(stub.calls, ['getPlayerStatus', 'setPlayerCmd:vol:100']);

    stub.volume = 5;
    assert.equal(await client.volumeDown(10), 0);
    assert.equal(stub.volume, 0);

    stub.volume = 40;
    assert.equal(await client.adjustVolume(-15), 25);
  });

  it('never turns an empty or unknown answer into a volume', async () => {
    const { client, stub } = stubClient();
    stub.reply('getPlayerStatus', '', 'loud', 'Failed');
    await assert.rejects(client.volume(), ProtocolError);
    await assert.rejects(client.volume(), ProtocolError);
    await assert.rejects(client.volume(), DeviceError);
  });
});

describe('LinkplayClient equalizer', () => {
  it('sets a known preset', async () => {
    const { client, stub } = stubClient();
    assert.equal(await client.equalizer('jazz'), true);
    assert.deepEqual(stub.calls, ['setPlayerCmd:equalizer:3']);
  });

  it('rejects unknown presets without touching the network', async () => {
    const { client, stub } = stubClient();
    await assert.rejects(client.equalizer('not-a-real-preset'), (error: unknown) => {
      assert.ok(error instanceof InvalidArgumentError);
      assert.equal(error.message, "Equalizer mode must be one of [off classical pop jazz vocal], not 'not-a-real-preset'");
      return true;
    });
    await assert.rejects(client.equalizer('toString'), InvalidArgumentError);
    assert.equal(stub.calls.length, 0);
  });

  it('reads the current preset by name', async () => {
    const { client, stub } = stubClient();
    stub.equalizer = 3;
    assert.equal(await client.equalizer(), 'jazz');
    stub.equalizer = 9;
    await assert.rejects(client.equalizer(), ProtocolError);
  });

  it('uses a configured preset table', async () => {
    const { client, stub } = stubClient(new DeviceStub(), { equalizerModes: { flat: 0, rock: 5 } });
    stub.equalizer = 5;
    assert.equal(await client.equalizer(), 'rock');
    await assert.rejects(client.equalizer('jazz'), InvalidArgumentError);
    assert.equal(await client.equalizer('flat'), true);
    assert.deepEqual(stub.calls, ['getEqualizer', 'setPlayerCmd:equalizer:0']);
  });
});

describe('LinkplayClient reboots', () => {
  it('sends a plain reboot', async () => {
    const { client, stub } = stubClient();
    assert.equal(await client.reboot(), true);
    assert.deepEqual(stub.calls, ['reboot']);
  });

  it('waits for the device to answer after a safe reboot', async () => {
    const { client, stub, sleeps } = stubClient();
    assert.equal(await client.safeReboot(), true);
    assert.deepEqual(stub.calls, ['reboot', 'getPlayerStatus']);
    assert.deepEqual(sleeps, [60_000]);
  });

  it('reboots again when the device does not come back', async () => {
    const { client, stub } = stubClient(new DeviceStub(), { rebootDelayMs: 10 });
    stub.reply('getPlayerStatus', 'error');
    assert.equal(await client.safeReboot(), true);
    assert.deepEqual(stub.calls, ['reboot', 'getPlayerStatus', 'reboot', 'getPlayerStatus']);
  });

  it('gives up after the retry budget', async () => {
    const { client, stub } = stubClient(new DeviceStub(), { rebootDelayMs: 10 });
    stub.reply('getPlayerStatus', 'unknown command', 'unknown command', 'unknown command');
    await assert.rejects(client.safeReboot(2), (error: unknown) => {
      assert.ok(error instanceof DeviceError);
      assert.equal(error.message, 'Failed to bring device back up after 3 reboot attempts. Giving up.');
      return true;
    });
    assert.equal(stub.calls.filter((call) => call === 'reboot').length, 3);
  });

  it('lowers and restores the volume around a quiet reboot', async () => {
    const { client, stub } = stubClient(new DeviceStub(), { rebootDelayMs: 10 });
    assert.equal(await client.quietReboot(), true);
    assert.deepEqual(stub.calls, [
      'getPlayerStatus',
      'setPlayerCmd:vol:1',
      'getPlayerStatus',
      'reboot',
      'getPlayerStatus',
      'setPlayerCmd:vol:30',
      'getPlayerStatus',
    ]);
    assert.equal(stub.volume, 30);
  });

  it('stops a quiet reboot when the volume does not drop', async () => {
    const { client, stub } = stubClient();
    stub.reply('getPlayerStatus', '{"vol":"30"}', '{"vol":"30"}');
    await assert.rejects(client.quietReboot(), (error: unknown) => {
      assert.ok(error instanceof DeviceError);
      assert.equal(error.message, 'Failed to set volume to minimum before quiet reboot');
      return true;
    });
    assert.deepEqual(stub.calls, ['getPlayerStatus', 'setPlayerCmd:vol:1', 'getPlayerStatus']);
  });

  it('distinguishes the three variants by what they send', async () => {
    const sequences: string[][] = [];
    for (const run of [
      (client: LinkplayClient) => client.reboot(),
      (client: LinkplayClient) => client.safeReboot(),
      (client: LinkplayClient) => client.quietReboot(),
    ]) {
      const { client, stub } = stubClient(new DeviceStub(), { rebootDelayMs: 0 });
      assert.equal(await run(client), true);
      sequences.push(stub.calls);
    }
    assert.equal(new Set(sequences.map((calls) => calls.join(' '))).size, 3);
  });
});

describe('LinkplayClient playback', () => {
  it('clamps rewinds and fast-forwards to the media length', async () => {
    const { client, stub } = stubClient();
    stub.length = 200_000;
    stub.position = 5000;
    await client.back(10);
    assert.equal(stub.calls.at(-1), 'setPlayerCmd:seek:0');

    stub.position = 190_000;
    await client.forward(30);
    assert.equal(stub.calls.at(-1), 'setPlayerCmd:seek:200');

    await client.seek(42.9);
    assert.equal(stub.calls.at(-1), 'setPlayerCmd:seek:42');
  });

  it('rejects malformed offsets before any request', async () => {
    const { client, stub } = stubClient();
    await assert.rejects(client.back(NaN), InvalidArgumentError);
    await assert.rejects(client.seek(Infinity), InvalidArgumentError);
    assert.equal(stub.calls.length, 0);
  });

  it('turns shuffle on without keeping single-track repeat', async () => {
    const { client, stub } = stubClient();
    stub.loop = 1;
    assert.equal(await client.shuffle(true), true);
    assert.deepEqual(stub.calls, ['getPlayerStatus', 'setPlayerCmd:loopmode:2']);
    assert.equal(await client.shuffle(), 'on');
    assert.equal(await client.repeat(), 'all');
  });

  it('turns shuffle off when repeating one track', async () => {
    const { client, stub } = stubClient();
    stub.loop = 2;
    await client.repeat('one');
    assert.equal(stub.loop, 1);
    await client.repeat('off');
    assert.equal(stub.loop, -1);
  });

  it('reads decoded track metadata', async () => {
    const { client } = stubClient();
    assert.equal(await client.run(COMMANDS.title), 'Morning Tune');
    assert.equal(await client.run(COMMANDS.artist), 'Test Band');
    assert.equal(await client.run(COMMANDS.album), 'Unknown');
    assert.equal(await client.run(COMMANDS.source), 'wiimu');
    assert.equal(await client.run(COMMANDS.transport), 'play');
  });

  it('reports a failed firmware search as a device failure', async () => {
    const { client, stub } = stubClient();
    stub.reply('getMvRemoteUpdateStartCheck', 'Failed');
    await assert.rejects(client.run(COMMANDS.firmwareUpdateSearch), DeviceError);
  });

  it('toggles muting', async () => {
    const { client, stub } = stubClient();
    assert.equal(await client.mute(), false);
    assert.equal(await client.toggleMute(), true);
    assert.equal(stub.calls.at(-1), 'setPlayerCmd:mute:1');
    assert.equal(await client.mute(), true);
  });
});

describe('LinkplayClient device information', () => {
  it('merges device and player status', async () => {
    const { client, stub } = stubClient();
    const info = await client.info();
    assert.equal(info.DeviceName, 'Kitchen');
    assert.equal(info.vol, '30');
    assert.deepEqual(stub.calls, ['getStatus', 'getPlayerStatus']);
  });

  it('reads single status fields', async () => {
    const { client } = stubClient();
    assert.equal(await client.name(), 'Kitchen');
    assert.equal(await client.run(COMMANDS.firmware), '4.2.8020');
    assert.equal(await client.run(COMMANDS.wifiChannel), 6);
    assert.equal(await client.run(COMMANDS.wifiSsidHidden), false);
  });

  it('reports the authentication subset of the status', async () => {
    const { client } = stubClient();
    assert.deepEqual(await client.wifiAuth(), {
      securemode: '1',
      auth: 'WPA2PSK',
      encry: 'AES',
      psk: 'test-secret',
    });
  });

  it('maps Wi-Fi states', async () => {
    const { client, stub } = stubClient();
    stub.reply('wlanGetConnectState', 'PAIRFAIL');
    assert.equal(await client.run(COMMANDS.wifiStatus), 'error-password');
  });
});

describe('LinkplayClient multiroom', () => {
  it('describes a master with its slaves', async () => {
    const { client } = stubClient();
    assert.deepEqual(await client.multiroomInfo(), { slaves: 0, slave_list: [], status: 'master' });
  });

  it('describes a slave with its master', async () => {
    const { client, stub } = stubClient();
    stub.reply('getStatus', '{"master_ip":"192.168.1.50"}');
    assert.deepEqual(await client.multiroomInfo(), {
      slaves: 0,
      slave_list: [],
      status: 'slave',
      master: { ip: '192.168.1.50' },
    });
  });

  it('asks the slave to join with this device network', async () => {
    const { client, stub } = stubClient();
    assert.equal(await client.multiroomAdd('192.168.1.56'), true);
    assert.deepEqual(stub.calls, [
      'getStatus',
      'ConnectMasterAp:ssid=486f6d654e6574:ch=6:auth=WPA2PSK:encry=AES:pwd=746573742d736563726574:chext=0',
    ]);
    assert.deepEqual(stub.hosts, ['192.168.1.55', '192.168.1.56']);
  });
});

describe('LinkplayClient pacing', () => {
  it('waits between back-to-back requests', async () => {
    const { client, sleeps } = stubClient(new DeviceStub(), { commandIntervalMs: 2000 });
    await client.run(COMMANDS.pause);
    await client.run(COMMANDS.resume);
    assert.equal(sleeps.length, 1);
    assert.ok(sleeps[0] > 0 && sleeps[0] <= 2000);
  });
});
