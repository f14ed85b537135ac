/**
 * Tests for decoding scanner messages into observations.
 */

import { describe, it, expect } from 'vitest';
import { isBleSourceConnected, parseObservationMessage } from '../clients/ble-mqtt.js';

const RECEIVED_AT = 1_700_000_000_000;

describe('parseObservationMessage', () => {
  it('decodes a single observation and stamps it with arrival time', () => {
    expect(parseObservationMessage('{"address":"AA:BB:CC:DD:EE:01","rssi":-61}', RECEIVED_AT)).toEqual([
      { macAddress: 'AA:BB:CC:DD:EE:01', signalStrengthDbm: -61, observedAt: RECEIVED_AT },
    ]);
  });

  it('stamps with arrival time even when the scanner sends its own clock', () => {
    const behind = JSON.stringify({ address: 'AA:BB:CC:DD:EE:01', rssi: -70, timestamp: RECEIVED_AT - 11_000 });
    const ahead = JSON.stringify({ address: 'AA:BB:CC:DD:EE:01', rssi: -70, timestamp: RECEIVED_AT + 60_000 });

    expect(parseObservationMessage(behind, RECEIVED_AT)[0].observedAt).toBe(RECEIVED_AT);
    expect(parseObservationMessage(ahead, RECEIVED_AT)[0].observedAt).toBe(RECEIVED_AT);
  });

  it('decodes a batch in order', () => {
    const message = JSON.stringify([
      { address: 'AA:BB:CC:DD:EE:01', rssi: -60 },
      { address: 'AA:BB:CC:DD:EE:02', rssi: -75, timestamp: RECEIVED_AT + 5 },
    ]);
    expect(parseObservationMessage(message, RECEIVED_AT)).toEqual([
      { macAddress: 'AA:BB:CC:DD:EE:01', signalStrengthDbm: -60, observedAt: RECEIVED_AT },
      { macAddress: 'AA:BB:CC:DD:EE:02', signalStrengthDbm: -75, observedAt: RECEIVED_AT },
    ]);
  });

  it('drops non-JSON and invalid payloads', () => {
    expect(parseObservationMessage('not json', RECEIVED_AT)).toEqual([]);
    expect(parseObservationMessage('{"address":"AA:BB:CC:DD:EE:01"}', RECEIVED_AT)).toEqual([]);
    expect(parseObservationMessage('{"address":"AA:BB:CC:DD:EE:01","rssi":-60.5}', RECEIVED_AT)).toEqual([]);
    expect(parseObservationMessage('{"address":"","rssi":-60}', RECEIVED_AT)).toEqual([]);
  });
});

describe('isBleSourceConnected', () => {
  it('reports disconnected before the source is started', () => {
    expect(isBleSourceConnected()).toBe(false);
  });
});
