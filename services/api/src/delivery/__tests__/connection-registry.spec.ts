import { ConnectionRegistry } from '../connection-registry';
import { FakeConnection } from './fake-connection';

describe('ConnectionRegistry', () => {
  let registry: ConnectionRegistry;

  beforeEach(() => {
    registry = new ConnectionRegistry();
  });

  it('should return every connection registered for a user', () => {
    const laptop = new FakeConnection('c1');
    const phone = new FakeConnection('c2');
    registry.register('u1', laptop);
    registry.register('u1', phone);

    expect(registry.handlesFor('u1')).toEqual([laptop, phone]);
    expect(registry.isOnline('u1')).toBe(true);
    expect(registry.connectionCount()).toBe(2);
  });

  it('should return an empty list for unknown users', () => {
    expect(registry.handlesFor('nobody')).toEqual([]);
    expect(registry.isOnline('nobody')).toBe(false);
  });

  it('should remove the user entry once the last connection goes', () => {
    const conn = new FakeConnection('c1');
    registry.register('u1', conn);

    expect(registry.unregister('u1', conn)).toBe(true);
    expect(registry.isOnline('u1')).toBe(false);
    expect(registry.onlineUsers()).toEqual([]);
  });

  it('should accept a connection id when unregistering', () => {
    registry.register('u1', new FakeConnection('c1'));
    registry.register('u1', new FakeConnection('c2'));

    expect(registry.unregister('u1', 'c1')).toBe(true);
    expect(registry.handlesFor('u1').map((c) => c.id)).toEqual(['c2']);
  });

  it('should treat unregistering unknown entries as a no-op', () => {
    expect(registry.unregister('u1', 'c1')).toBe(false);
    registry.register('u1', new FakeConnection('c1'));
    expect(registry.unregister('u1', 'missing')).toBe(false);
    expect(registry.connectionCount()).toBe(1);
  });

  it('should hand out snapshots unaffected by later changes', () => {
    const first = new FakeConnection('c1');
    registry.register('u1', first);
    const snapshot = registry.handlesFor('u1');

    registry.register('u1', new FakeConnection('c2'));
    registry.unregister('u1', first);

    expect(snapshot).toEqual([first]);
  });

  it('should keep users isolated from each other', () => {
    registry.register('u1', new FakeConnection('c1'));
    registry.register('u2', new FakeConnection('c2'));

    expect(registry.onlineUsers().sort()).toEqual(['u1', 'u2']);
    expect(registry.handlesFor('u2').map((c) => c.id)).toEqual(['c2']);
  });
});
