import { mkdir, mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LocalActuator, RemoteActuator, SysfsGpio, type ActuationCommand } from '../../shared/src/index.js';
import { FakeOutput, deferred, fakeFetch, jsonResponse } from '../helpers/fakes.js';

const CAN: ActuationCommand = { label: 'can', channel: 17, durationMs: 1000 };
const PLASTIC: ActuationCommand = { label: 'plastic', channel: 27, durationMs: 2000 };

describe('LocalActuator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('energizes the channel for the configured duration, then switches it off', async () => {
    const output = new FakeOutput();
    const actuator = new LocalActuator({ output, channels: [17, 27] });
    const startedAt = Date.now();

    const run = actuator.activate(CAN);
    await vi.advanceTimersByTimeAsync(1000);
    await run;

    expect(output.setups).toEqual([17, 27]);
    expect(output.writes.map(({ channel, high }) => ({ channel, high }))).toEqual([
      { channel: 17, high: true },
      { channel: 17, high: false },
    ]);
    expect(output.writes[1].at - startedAt).toBe(1000);
    expect(output.levels.get(17)).toBe(false);
    expect(actuator.active).toBeNull();
  });

  it('does not resolve before the duration has elapsed', async () => {
    const output = new FakeOutput();
    const actuator = new LocalActuator({ output, channels: [17, 27] });

    let done = false;
    const run = actuator.activate(PLASTIC).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(1999);
    expect(done).toBe(false);
    expect(output.levels.get(27)).toBe(true);

    await vi.advanceTimersByTimeAsync(1);
    await run;
    expect(done).toBe(true);
    expect(output.levels.get(27)).toBe(false);
  });

  it('rejects a second activation while one is running', async () => {
    const output = new FakeOutput();
    const actuator = new LocalActuator({ output, channels: [17, 27] });

    const run = actuator.activate(CAN);
    expect(actuator.active).toBe(17);
    await expect(actuator.activate(PLASTIC)).rejects.toMatchObject({
      kind: 'Busy',
      message: 'Channel 17 is still running',
    });

    await vi.advanceTimersByTimeAsync(1000);
    await run;
    expect(output.writes.filter((w) => w.channel === 27)).toEqual([]);
  });

  it('switches off at once on a fault but still waits out the duration', async () => {
    const output = new FakeOutput();
    output.failOnHigh = true;
    const actuator = new LocalActuator({ output, channels: [17, 27] });

    let settled = false;
    const outcome = actuator.activate(CAN).then(
      () => null,
      (err: unknown) => err,
    );
    void outcome.then(() => {
      settled = true;
    });

    await vi.advanceTimersByTimeAsync(0);
    expect(output.levels.get(17)).toBe(false);

    await vi.advanceTimersByTimeAsync(999);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(await outcome).toMatchObject({ kind: 'ActuationError', message: 'relay fault' });
    expect(actuator.active).toBeNull();
  });

  it('refuses a channel it is not wired to', async () => {
    const output = new FakeOutput();
    const actuator = new LocalActuator({ output, channels: [17, 27] });

    await expect(actuator.activate({ label: 'can', channel: 5, durationMs: 1000 })).rejects.toMatchObject({
      kind: 'ActuationError',
      message: 'Channel 5 is not wired to this node',
    });
    expect(output.writes).toEqual([]);
  });

  it('drives every channel low on shutdown', async () => {
    const output = new FakeOutput();
    const actuator = new LocalActuator({ output, channels: [17, 27] });
    await actuator.init();

    await actuator.shutdown();

    expect(output.writes.map(({ channel, high }) => ({ channel, high }))).toEqual([
      { channel: 17, high: false },
      { channel: 27, high: false },
    ]);
  });
});

describe('RemoteActuator', () => {
  const baseUrl = 'http://pi.local:5001';

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends only the label; the peripheral owns channel and duration', async () => {
    const { fetchImpl, requests } = fakeFetch({
      [`POST ${baseUrl}/api/motor`]: () =>
        jsonResponse({ status: 'success', message: 'Can motor activated for 1s', prediction: 'can' }),
    });
    const actuator = new RemoteActuator({ peripheralId: 'pi', baseUrl, timeoutMs: 100, fetchImpl });

    await actuator.activate(CAN);

    expect(requests).toEqual([{ url: `${baseUrl}/api/motor`, method: 'POST', body: { prediction: 'can' } }]);
  });

  it('reports a busy peripheral as Busy', async () => {
    const { fetchImpl } = fakeFetch({
      [`POST ${baseUrl}/api/motor`]: () =>
        jsonResponse({ status: 'error', message: 'peripheral is busy (capture in progress)', kind: 'Busy' }, 409),
    });
    const actuator = new RemoteActuator({ peripheralId: 'pi', baseUrl, timeoutMs: 100, fetchImpl });

    await expect(actuator.activate(PLASTIC)).rejects.toMatchObject({ kind: 'Busy' });
  });

  it('reports a motor fault as ActuationError', async () => {
    const { fetchImpl } = fakeFetch({
      [`POST ${baseUrl}/api/motor`]: () => jsonResponse({ status: 'error', message: 'GPIO write failed' }, 500),
    });
    const actuator = new RemoteActuator({ peripheralId: 'pi', baseUrl, timeoutMs: 100, fetchImpl });

    await expect(actuator.activate(CAN)).rejects.toMatchObject({
      kind: 'ActuationError',
      message: 'GPIO write failed',
    });
  });

  it('never has two activations in flight', async () => {
    const gate = deferred<Response>();
    const { fetchImpl, requests } = fakeFetch({ [`POST ${baseUrl}/api/motor`]: () => gate.promise });
    const actuator = new RemoteActuator({ peripheralId: 'pi', baseUrl, timeoutMs: 100, fetchImpl });

    const first = actuator.activate(CAN);
    await expect(actuator.activate(PLASTIC)).rejects.toMatchObject({
      kind: 'Busy',
      message: 'actuator on pi is busy (activate can in progress)',
    });

    gate.resolve(jsonResponse({ status: 'success', message: 'Can motor activated for 1s', prediction: 'can' }));
    await first;
    expect(requests).toHaveLength(1);
  });
});

describe('SysfsGpio', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'gpio-'));
    await mkdir(join(root, 'gpio17'));
  });
  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('configures an exported pin as a low output', async () => {
    const gpio = new SysfsGpio(root);

    await gpio.setup(17);

    expect(await readFile(join(root, 'gpio17', 'direction'), 'utf8')).toBe('out');
    expect(await readFile(join(root, 'gpio17', 'value'), 'utf8')).toBe('0');
  });

  it('writes the level to the value file', async () => {
    const gpio = new SysfsGpio(root);
    await gpio.setup(17);

    await gpio.write(17, true);
    expect(await readFile(join(root, 'gpio17', 'value'), 'utf8')).toBe('1');

    await gpio.write(17, false);
    expect(await readFile(join(root, 'gpio17', 'value'), 'utf8')).toBe('0');
  });

  it('exports a pin that is not there yet', async () => {
    const gpio = new SysfsGpio(root);

    // The kernel would create gpio22 in response; here it stays missing.
    await expect(gpio.setup(22)).rejects.toThrow();
    expect(await readFile(join(root, 'export'), 'utf8')).toBe('22');
  });
});
