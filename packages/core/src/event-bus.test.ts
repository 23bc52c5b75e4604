import { describe, expect, it, vi } from 'vitest';
import { EventBusImpl } from './event-bus';

describe('EventBusImpl', () => {
  it('delivers the payload to every listener of the event', () => {
    const bus = new EventBusImpl();
    const first = vi.fn();
    const second = vi.fn();

    bus.on('store:layer-added', first);
    bus.on('store:layer-added', second);
    bus.emit('store:layer-added', { store: 'additive', layerName: 'rainbow' });

    expect(first).toHaveBeenCalledWith({ store: 'additive', layerName: 'rainbow' });
    expect(second).toHaveBeenCalledOnce();
  });

  it('calls listeners in subscription order', () => {
    const bus = new EventBusImpl();
    const order: string[] = [];

    bus.on('store:special', () => order.push('first'));
    bus.on('store:special', () => order.push('second'));
    bus.emit('store:special', { store: 'toggle-set' });

    expect(order).toEqual(['first', 'second']);
  });

  it('ignores events nobody listens to', () => {
    const bus = new EventBusImpl();
    const erased = vi.fn();

    bus.on('store:layer-erased', erased);
    bus.emit('store:special', { store: 'single-slot' });

    expect(erased).not.toHaveBeenCalled();
  });

  it('stops delivering after unsubscribe', () => {
    const bus = new EventBusImpl();
    const special = vi.fn();

    const unsubscribe = bus.on('store:special', special);
    unsubscribe();
    unsubscribe();
    bus.emit('store:special', { store: 'additive' });

    expect(special).not.toHaveBeenCalled();
  });

  it('lets a listener unsubscribe while the event is delivered', () => {
    const bus = new EventBusImpl();
    const later = vi.fn();
    const unsubscribe: () => void = bus.on('store:special', () => unsubscribe());
    bus.on('store:special', later);

    bus.emit('store:special', { store: 'additive' });
    bus.emit('store:special', { store: 'additive' });

    expect(later).toHaveBeenCalledTimes(2);
  });
});
