import { afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import { SerialPortMock } from 'serialport';
import SerialLineTransport from '../node-serialport.js';
import type { PortFactory, PortOpenOptions } from '../node-serialport.js';
import { rootLogger } from '../../../logger.js';
import { ConfigError, SerialConnectionError, SerialTransportError } from '../../../errors.js';

const PATH = '/dev/ttyMETER0';

describe('SerialLineTransport', () => {
  let created: SerialPortMock[];
  let openOptions: PortOpenOptions[];
  let factory: PortFactory;

  beforeAll(() => {
    rootLogger.disable();
  });

  beforeEach(() => {
    SerialPortMock.binding.createPort(PATH, { echo: false, record: false });
    created = [];
    openOptions = [];
    factory = options => {
      openOptions.push(options);
      const port = new SerialPortMock(options);
      created.push(port);
      return port;
    };
  });

  afterEach(() => {
    SerialPortMock.binding.reset();
  });

  it('opens the port with the meter line settings', async () => {
    const transport = new SerialLineTransport(PATH, {}, factory);
    await transport.open();

    expect(transport.isOpen).toBe(true);
    expect(openOptions).toEqual([
      {
        path: PATH,
        baudRate: 19200,
        dataBits: 7,
        stopBits: 1,
        parity: 'odd',
        xon: true,
        xoff: true,
        rtscts: false,
        autoOpen: false,
      },
    ]);
    await transport.close();
    expect(transport.isOpen).toBe(false);
  });

  it('splits incoming data into records with the delimiter kept', async () => {
    const transport = new SerialLineTransport(PATH, {}, factory);
    await transport.open();

    created[0]?.port?.emitData('41234;000\r\n050006000\r\n312');

    await expect(transport.readLine(500)).resolves.toBe('41234;000\r\n');
    await expect(transport.readLine(500)).resolves.toBe('050006000\r\n');
    // the partial record stays buffered
    await expect(transport.readLine(20)).resolves.toBeNull();
    await transport.close();
  });

  it('resolves null when nothing arrives in time', async () => {
    const transport = new SerialLineTransport(PATH, { readTimeout: 10 }, factory);
    await transport.open();
    await expect(transport.readLine()).resolves.toBeNull();
    await transport.close();
  });

  it('resolves a pending read with null when the signal aborts', async () => {
    const transport = new SerialLineTransport(PATH, {}, factory);
    await transport.open();

    const controller = new AbortController();
    const started = Date.now();
    const pending = transport.readLine(5000, controller.signal);
    setTimeout(() => controller.abort(), 20);

    await expect(pending).resolves.toBeNull();
    expect(Date.now() - started).toBeLessThan(1000);
    // an already aborted signal does not wait at all
    await expect(transport.readLine(5000, controller.signal)).resolves.toBeNull();
    await transport.close();
  });

  it('drops the oldest record when the queue is full', async () => {
    const transport = new SerialLineTransport(PATH, { maxQueuedLines: 2 }, factory);
    await transport.open();

    created[0]?.port?.emitData('11234;000\r\n21234;000\r\n31234;000\r\n');
    await vi.waitFor(() => expect(transport.droppedLines).toBe(1));

    await expect(transport.readLine(20)).resolves.toBe('21234;000\r\n');
    await expect(transport.readLine(20)).resolves.toBe('31234;000\r\n');
    await transport.close();
  });

  it('rejects pending reads when the port goes away', async () => {
    const transport = new SerialLineTransport(PATH, {}, factory);
    await transport.open();

    const pending = transport.readLine(1000);
    created[0]?.close();

    await expect(pending).rejects.toBeInstanceOf(SerialTransportError);
    await expect(transport.readLine(10)).rejects.toBeInstanceOf(SerialTransportError);
    await transport.close();
  });

  it('rejects reads after close', async () => {
    const transport = new SerialLineTransport(PATH, {}, factory);
    await transport.open();
    await transport.close();
    await transport.close();
    await expect(transport.readLine(10)).rejects.toThrow('Port closed');
  });

  it('reports a missing port as a connection error', async () => {
    const transport = new SerialLineTransport('/dev/ttyMISSING', {}, factory);
    await expect(transport.open()).rejects.toThrow(SerialConnectionError);
    await expect(transport.open()).rejects.toThrow('Serial port does not exist');
  });

  it('validates the baud rate before touching the port', async () => {
    const transport = new SerialLineTransport(PATH, { baudRate: 1 }, factory);
    await expect(transport.open()).rejects.toThrow(ConfigError);
    expect(created).toHaveLength(0);
  });
});
