import { LinkplayClient, ClientOptions } from '../src/device/client.js';
import { DeviceEndpoint } from '../src/device/endpoint.js';
import { hex } from '../src/device/hex.js';
import { Transport } from '../src/device/transport.js';

/**
 * In-process stand-in for a speaker. Keeps just enough player state to
 * answer status reads the way the firmware does; `reply` queues raw bodies
 * that win over the emulation for a given command.
 */
export class DeviceStub implements Transport {
  readonly calls: string[] = [];
  readonly hosts: string[] = [];
  volume = 30;
  muted = false;
  loop = -1;
  position = 0;
  length = 0;
  equalizer = 0;
  broken = false;
  private readonly queued = new Map<string, string[]>();

  reply(command: string, ...bodies: string[]): this {
    this.queued.set(command, [...(this.queued.get(command) ?? []), ...bodies]);
    return this;
  }

  async send(endpoint: DeviceEndpoint, command: string): Promise<string> {
    this.calls.push(command);
    this.hosts.push(endpoint.host);
    const next = this.queued.get(command)?.shift();
    if (next !== undefined) {
      return next;
    }
    if (this.broken) {
      return 'error';
    }
    return this.emulate(command);
  }

  private emulate(command: string): string {
    switch (command) {
      case 'getPlayerStatus':
        return JSON.stringify({
          status: 'play',
          mode: '10',
          loop: String(this.loop),
          curpos: String(this.position),
          totlen: String(this.length),
          vol: String(this.volume),
          mute: this.muted ? '1' : '0',
          Title: hex('Morning Tune'),
          Artist: hex('Test Band'),
          Album: 'Unknown',
        });
      case 'getStatus':
        return JSON.stringify({
          DeviceName: 'Kitchen',
          uuid: 'FF31F09E-TEST-0001',
          firmware: '4.2.8020',
          hardware: 'A31',
          project: 'UP2STREAM_AMP',
          ssid: 'HomeNet',
          WifiChannel: '6',
          hideSSID: '0',
          MAC: '00:22:6C:00:00:01',
          securemode: '1',
          auth: 'WPA2PSK',
          encry: 'AES',
          psk: 'test-secret',
          language: 'en_us',
        });
      case 'getEqualizer':
        return String(this.equalizer);
      case 'multiroom:getSlaveList':
        return JSON.stringify({ slaves: 0, slave_list: [] });
      case 'setPlayerCmd:mute:1':
        this.muted = true;
        return 'OK';
      case 'setPlayerCmd:mute:0':
        this.muted = false;
        return 'OK';
    }

    const volume = command.match(/^setPlayerCmd:vol:(\d+)$/);
    if (volume) {
      this.volume = parseInt(volume[1], 10);
      return 'OK';
    }
    const loop = command.match(/^setPlayerCmd:loopmode:(-?\d+)$/);
    if (loop) {
      this.loop = parseInt(loop[1], 10);
      return 'OK';
    }
    const seek = command.match(/^setPlayerCmd:seek:(\d+)$/);
    if (seek) {
      this.position = parseInt(seek[1], 10) * 1000;
      return 'OK';
    }
    if (
      command === 'reboot' ||
      command.startsWith('setPlayerCmd:') ||
      command.startsWith('Prompt') ||
      command.startsWith('ConnectMasterAp:') ||
      command.startsWith('MCUKeyShortClick:')
    ) {
      return 'OK';
    }
    return 'unknown command';
  }
}

export function recordSleeps(): { sleeps: number[]; sleep: (ms: number) => Promise<void> } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };
}

export function stubClient(
  stub: DeviceStub = new DeviceStub(),
  options: ClientOptions = {},
  address = '192.168.1.55',
): { client: LinkplayClient; stub: DeviceStub; sleeps: number[] } {
  const { sleeps, sleep } = recordSleeps();
  const client = new LinkplayClient(address, {
    transport: stub,
    commandIntervalMs: 0,
    sleep,
    ...options,
  });
  return { client, stub, sleeps };
}
