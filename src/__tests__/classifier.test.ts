/**
 * Unit tests for NEAR/FAR hysteresis and ALPHA adaptation.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PresenceClassifier } from '../presence/classifier.js';
import { SignalTracker } from '../presence/signal.js';
import { createTenant } from '../presence/registry.js';
import { ProximityState, type Tenant } from '../presence/types.js';
import { TEST_TUNING } from './fakes.js';

describe('PresenceClassifier', () => {
  let tracker: SignalTracker;
  let classifier: PresenceClassifier;
  let tenant: Tenant;

  function feed(rssi: number, at: number) {
    tracker.update(tenant, rssi, at);
    const transition = classifier.evaluate(tenant, at);
    tenant.lastSeenAt = at;
    return transition;
  }

  beforeEach(() => {
    tracker = new SignalTracker(TEST_TUNING.windowSec * 1000, 0.8);
    classifier = new PresenceClassifier(TEST_TUNING, tracker);
    tenant = createTenant('AA:BB:CC:DD:EE:01', 'apt-1');
  });

  it('goes NEAR on the packet that fills the window, then FAR on a weak signal', () => {
    expect(feed(-60, 0)).toBeNull();
    expect(feed(-60, 100)).toBeNull();
    expect(feed(-60, 200)).toBeNull();
    expect(tenant.isNear).toBe(false);

    expect(feed(-60, 300)).toEqual({
      tenantId: 'apt-1',
      macAddress: 'AA:BB:CC:DD:EE:01',
      from: ProximityState.FAR,
      to: ProximityState.NEAR,
      ewma: -60,
      packetCount: 4,
      at: 300,
    });
    expect(tenant.isNear).toBe(true);

    feed(-72, 400);
    feed(-72, 700);
    feed(-72, 1000);

    expect(tenant.packetTimestamps.length).toBeGreaterThanOrEqual(4);
    expect(tenant.ewma).toBeLessThan(-69);
    expect(tenant.isNear).toBe(false);
  });

  it('leaves on the first weak packet once the average crosses the exit threshold', () => {
    for (const at of [0, 100, 200, 300]) feed(-60, at);

    const transition = feed(-72, 400);

    // 0.8 * -72 + 0.2 * -60
    expect(transition?.ewma).toBeCloseTo(-69.6, 6);
    expect(transition?.to).toBe(ProximityState.FAR);
    expect(transition?.packetCount).toBe(5);
  });

  it('stays NEAR while the average sits between exit and enter', () => {
    for (const at of [0, 100, 200, 300]) feed(-60, at);

    expect(feed(-67, 400)).toBeNull();
    // 0.8 * -67 + 0.2 * -60
    expect(tenant.ewma).toBeCloseTo(-65.6, 6);
    expect(feed(-67, 500)).toBeNull();
    expect(tenant.ewma).toBeCloseTo(-66.72, 6);
    expect(tenant.isNear).toBe(true);
  });

  it('stays FAR while the average sits between exit and enter', () => {
    for (const at of [0, 100, 200, 300, 400]) feed(-67, at);
    expect(tenant.ewma).toBe(-67);
    expect(tenant.isNear).toBe(false);
  });

  it('needs the packet count even with a strong signal', () => {
    feed(-40, 0);
    feed(-40, 1500);
    feed(-40, 3000);
    feed(-40, 4500); // first packet has left the window
    expect(tenant.packetTimestamps).toEqual([1500, 3000, 4500]);
    expect(tenant.isNear).toBe(false);
  });

  it('drops to FAR when the window starves regardless of EWMA', () => {
    for (const at of [0, 100, 200, 300]) feed(-60, at);
    expect(tenant.isNear).toBe(true);

    tracker.expire(tenant, 4301);
    const transition = classifier.evaluate(tenant, 4301);

    expect(transition).toEqual({
      tenantId: 'apt-1',
      macAddress: 'AA:BB:CC:DD:EE:01',
      from: ProximityState.NEAR,
      to: ProximityState.FAR,
      ewma: -60,
      packetCount: 0,
      at: 4301,
    });
  });

  it('holds NEAR for as long as a strong signal keeps arriving', () => {
    for (let at = 0; at <= 20_000; at += 250) {
      feed(-55, at);
      if (at >= 750) expect(tenant.isNear).toBe(true);
    }
  });

  it('switches the shared ALPHA only when the aggregate flips', () => {
    expect(tracker.alpha).toBe(0.8);
    expect(classifier.adaptSensitivity(true)).toBe(true);
    expect(tracker.alpha).toBe(0.3);
    expect(classifier.adaptSensitivity(true)).toBe(false);
    expect(classifier.adaptSensitivity(false)).toBe(true);
    expect(tracker.alpha).toBe(0.8);
  });
});
