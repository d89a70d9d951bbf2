/**
 * Unit tests for MpvPipeline
 */

import { MpvPipeline } from '../MpvPipeline';
import { BusMessage, DecodeGraph } from '../../../domain/playback/types';
import {
  FakeIPCClient,
  FakeProcessManager,
  createTestLogger
} from '../../../__tests__/setup/playback-mocks';

const graph: DecodeGraph = {
  source: {
    location: 'https://media.test/BV1xx411c7mD.m4s',
    headers: {
      'User-Agent': 'test-agent',
      Referer: 'https://media.test',
      Origin: 'https://media.test'
    }
  },
  convert: {},
  resample: {},
  sink: { device: 'auto' }
};

describe('MpvPipeline', () => {
  let ipc: FakeIPCClient;
  let processes: FakeProcessManager;
  let pipeline: MpvPipeline;
  let bus: BusMessage[];

  beforeEach(() => {
    ipc = new FakeIPCClient();
    processes = new FakeProcessManager();
    pipeline = new MpvPipeline(
      ipc,
      processes,
      {
        mpv: { executable: 'mpv', socketPath: '/tmp/chorus-test.sock', volume: 100 },
        socketWaitMs: 0,
        commandRetries: 1,
        sleep: async () => undefined
      },
      createTestLogger()
    );
    bus = [];
    pipeline.addBusListener(message => bus.push(message));
  });

  describe('state transitions', () => {
    it('starts mpv and connects when moving to READY', async () => {
      const result = await pipeline.setState('READY');

      expect(result).toEqual({ success: true, value: undefined });
      expect(processes.startCalls).toHaveLength(1);
      expect(ipc.connectCalls).toEqual(['/tmp/chorus-test.sock']);
      expect(ipc.commandLines()).toEqual(['set_property pause true']);
      expect(pipeline.getState()).toBe('READY');
    });

    it('reports ENGINE_UNAVAILABLE when mpv cannot be started', async () => {
      processes.startResult = { success: false, error: 'DEPENDENCY_MISSING' };

      expect(await pipeline.setState('READY')).toEqual({ success: false, error: 'ENGINE_UNAVAILABLE' });
      expect(pipeline.getState()).toBe('NULL');
    });

    it('reports ENGINE_UNAVAILABLE when the socket cannot be reached', async () => {
      ipc.connectError = new Error('ENOENT');

      expect(await pipeline.setState('READY')).toEqual({ success: false, error: 'ENGINE_UNAVAILABLE' });
    });

    it('refuses PLAYING and PAUSED without an attached graph', async () => {
      await pipeline.setState('READY');

      expect(await pipeline.setState('PLAYING')).toEqual({ success: false, error: 'PIPELINE_STATE' });
      expect(await pipeline.setState('PAUSED')).toEqual({ success: false, error: 'PIPELINE_STATE' });
      expect(pipeline.getState()).toBe('READY');
    });

    it('toggles the pause property between PLAYING and PAUSED', async () => {
      await pipeline.setState('READY');
      await pipeline.attach(graph);

      await pipeline.setState('PLAYING');
      expect(pipeline.getState()).toBe('PLAYING');
      await pipeline.setState('PAUSED');
      expect(pipeline.getState()).toBe('PAUSED');

      expect(ipc.commandLines().slice(-2)).toEqual(['set_property pause false', 'set_property pause true']);
    });

    it('stops mpv and drops the graph on NULL', async () => {
      await pipeline.setState('READY');
      await pipeline.attach(graph);

      expect(await pipeline.setState('NULL')).toEqual({ success: true, value: undefined });
      expect(pipeline.hasGraph()).toBe(false);
      expect(pipeline.getState()).toBe('NULL');
      expect(ipc.commandLines().pop()).toBe('stop');
    });

    it('reaches NULL without talking to mpv when it never ran', async () => {
      expect(await pipeline.setState('NULL')).toEqual({ success: true, value: undefined });
      expect(ipc.commands).toHaveLength(0);
    });
  });

  describe('attach', () => {
    it('maps the graph onto mpv properties and loads the stream', async () => {
      const result = await pipeline.attach({ ...graph, resample: { sampleRate: 48000 }, convert: { format: 's16' } });

      expect(result).toEqual({ success: true, value: undefined });
      expect(ipc.commandLines()).toEqual([
        'set_property user-agent test-agent',
        'set_property referrer https://media.test',
        'set_property http-header-fields Origin: https://media.test',
        'set_property audio-device auto',
        'set_property audio-samplerate 48000',
        'set_property audio-format s16',
        'loadfile https://media.test/BV1xx411c7mD.m4s replace'
      ]);
      expect(ipc.commands[2].command[2]).toEqual(['Origin: https://media.test']);
      expect(pipeline.hasGraph()).toBe(true);
    });

    it('reports PIPELINE_ELEMENT when a property is rejected', async () => {
      ipc.replies.set('set_property', { error: 'property unavailable' });

      expect(await pipeline.attach(graph)).toEqual({ success: false, error: 'PIPELINE_ELEMENT' });
      expect(pipeline.hasGraph()).toBe(false);
    });

    it('reports PIPELINE_LINK when loadfile is rejected', async () => {
      ipc.replies.set('loadfile', { error: 'invalid parameter' });

      expect(await pipeline.attach(graph)).toEqual({ success: false, error: 'PIPELINE_LINK' });
      expect(pipeline.hasGraph()).toBe(false);
    });
  });

  it('removeAll clears the playlist and stops the current file', async () => {
    await pipeline.attach(graph);

    expect(await pipeline.removeAll()).toEqual({ success: true, value: undefined });
    expect(ipc.commandLines().slice(-2)).toEqual(['playlist-clear', 'stop']);
    expect(pipeline.hasGraph()).toBe(false);
  });

  describe('command recovery', () => {
    it('restarts mpv and retries once when a command fails in transit', async () => {
      await pipeline.setState('READY');
      let failures = 1;
      const send = ipc.sendCommand.bind(ipc);
      jest.spyOn(ipc, 'sendCommand').mockImplementation(async command => {
        if (failures > 0) {
          failures--;
          throw new Error('Request timeout');
        }
        return send(command);
      });

      expect(await pipeline.attach(graph)).toEqual({ success: true, value: undefined });
      expect(processes.restartCalls).toBe(1);
    });

    it('gives up after the configured retries', async () => {
      await pipeline.setState('READY');
      ipc.replies.set('set_property', new Error('Request timeout'));

      expect(await pipeline.attach(graph)).toEqual({ success: false, error: 'PIPELINE_ELEMENT' });
      expect(processes.restartCalls).toBe(1);
    });
  });

  describe('bus', () => {
    beforeEach(async () => {
      await pipeline.setState('READY');
      await pipeline.attach(graph);
    });

    it('posts EOS when the file reaches its end', () => {
      ipc.simulateEvent({ event: 'end-file', reason: 'eof' });

      expect(bus).toEqual([{ type: 'EOS' }]);
    });

    it('posts ERROR with the file error', () => {
      ipc.simulateEvent({ event: 'end-file', reason: 'error', file_error: 'loading failed' });

      expect(bus).toEqual([{ type: 'ERROR', message: 'loading failed' }]);
    });

    it('ignores files ended by a stop or replace', () => {
      ipc.simulateEvent({ event: 'end-file', reason: 'stop' });
      ipc.simulateEvent({ event: 'playback-restart' });

      expect(bus).toEqual([]);
    });

    it('ignores end-file once the graph was removed', async () => {
      await pipeline.removeAll();
      ipc.simulateEvent({ event: 'end-file', reason: 'eof' });

      expect(bus).toEqual([]);
    });

    it('posts ERROR and drops to NULL when mpv dies mid-track', () => {
      processes.simulateCrash(139);

      expect(bus).toEqual([{ type: 'ERROR', message: 'mpv exited (code 139, signal none)' }]);
      expect(pipeline.getState()).toBe('NULL');
      expect(pipeline.hasGraph()).toBe(false);
    });
  });

  it('shutdown disconnects, stops mpv and detaches listeners', async () => {
    await pipeline.setState('READY');
    await pipeline.attach(graph);

    await pipeline.shutdown();
    ipc.simulateEvent({ event: 'end-file', reason: 'eof' });

    expect(ipc.isConnected()).toBe(false);
    expect(processes.isRunning()).toBe(false);
    expect(bus).toEqual([]);
  });
});
