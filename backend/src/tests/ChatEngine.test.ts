import { describe, it, expect, vi } from 'vitest';
import { createHarness, STREAM_KEY } from './helpers/chatHarness';

const alice = { username: 'alice', type: 'normal', color: '#0000ff' };

describe('ChatEngine login', () => {
  it('logs a viewer in and announces them to the room', async () => {
    const { bus, login, engine } = createHarness();

    await login('c-alice', { username: 'alice', streamer: 'Bob', color: 'blue' });

    expect(bus.received('c-alice')).toEqual([
      { event: 'login success', payload: { username: 'alice' } },
      { event: 'connected', payload: { ...alice, users: [alice] } }
    ]);
    expect(bus.members('bob')).toEqual(['c-alice']);
    expect(engine.registry.listRoom('bob')).toEqual([alice]);
    expect(engine.viewerCount('bob')).toBe(1);
  });

  it('asks for the key when someone claims the streamer name without one', async () => {
    const { bus, login, engine } = createHarness({ seeds: [{ username: 'Bob', key: STREAM_KEY }] });

    await login('c-bob', { username: 'bob', streamer: 'bob' });

    expect(bus.received('c-bob')).toEqual([{ event: 'login key required', payload: { username: 'Bob' } }]);
    expect(engine.registry.has('c-bob')).toBe(false);
    expect(engine.viewerCount('bob')).toBe(0);
  });

  it('grants admin rights with the right key under the canonical name', async () => {
    const { bus, login, engine } = createHarness({ seeds: [{ username: 'Bob', key: STREAM_KEY }] });
    await login('c-alice', { username: 'alice', streamer: 'bob', color: 'blue' });
    bus.clear();

    await login('c-bob', { username: 'BOB', streamer: 'bob', key: STREAM_KEY });

    const admin = { username: 'Bob', type: 'admin', color: '#000000' };
    expect(bus.received('c-bob')).toEqual([
      { event: 'login success', payload: { username: 'Bob' } },
      { event: 'connected', payload: { ...admin, users: [alice, admin] } },
      { event: 'server', payload: { msg: 'You have admin rights.' } }
    ]);
    expect(bus.received('c-alice')).toEqual([{ event: 'connected', payload: { ...admin, users: [alice, admin] } }]);
    expect(engine.registry.get('c-bob')?.admin).toBe(true);
  });

  it('rejects a wrong key', async () => {
    const { bus, login, engine } = createHarness();

    await login('c-bob', { username: 'bob', streamer: 'bob', key: 'wrong-secret' });

    expect(bus.received('c-bob')).toEqual([{ event: 'error', payload: { msg: 'Invalid password!' } }]);
    expect(engine.registry.has('c-bob')).toBe(false);
  });

  it('rejects an unknown streamer', async () => {
    const { bus, login } = createHarness();

    await login('c1', { username: 'alice', streamer: 'nobody' });

    expect(bus.notices('c1')).toEqual(['Streamer does not exist']);
  });

  it('rejects a name already taken in the room, ignoring case', async () => {
    const { bus, login, engine } = createHarness();
    await login('c1', { username: 'alice', streamer: 'bob' });

    await login('c2', { username: 'ALICE', streamer: 'bob' });

    expect(bus.received('c2')).toEqual([{ event: 'error', payload: { msg: 'Username is already taken' } }]);
    expect(engine.registry.size()).toBe(1);
  });

  it('lets only one of two simultaneous logins take a name', async () => {
    const { bus, login, engine } = createHarness();

    await Promise.all([
      login('c1', { username: 'alice', streamer: 'bob' }),
      login('c2', { username: 'Alice', streamer: 'bob' })
    ]);

    expect(engine.registry.size()).toBe(1);
    expect(engine.registry.get('c1')?.username).toBe('alice');
    expect(bus.notices('c2')).toEqual(['Username is already taken']);
  });

  it('refuses a second login on the same connection', async () => {
    const { bus, login, engine } = createHarness();
    await login('c1', { username: 'alice', streamer: 'bob' });
    bus.clear();

    await login('c1', { username: 'carol', streamer: 'bob' });

    expect(bus.notices('c1')).toEqual(['Already logged in']);
    expect(engine.registry.get('c1')?.username).toBe('alice');
  });

  it('validates the claimed username', async () => {
    const { bus, login } = createHarness();

    await login('c1', { username: '   ', streamer: 'bob' });
    await login('c1', { username: 'x'.repeat(30), streamer: 'bob' });
    await login('c1', { streamer: 'bob' });
    await login('c1', { username: 'alice' });
    await login('c1', undefined);

    expect(bus.notices('c1')).toEqual([
      'Username cannot be blank',
      'Username cannot be that long',
      'Username missing from payload',
      'Streamer missing from payload',
      'Payload missing'
    ]);
  });

  it('accepts a 29 character name and trims surrounding space', async () => {
    const { login, engine } = createHarness();
    const name = 'y'.repeat(29);

    await login('c1', { username: `  ${name} `, streamer: 'bob' });

    expect(engine.registry.get('c1')?.username).toBe(name);
  });

  it('measures name length in characters', async () => {
    const { bus, login, engine } = createHarness();
    const grin = '\u{1F600}';

    await login('c1', { username: grin.repeat(30), streamer: 'bob' });
    await login('c1', { username: grin.repeat(29), streamer: 'bob' });

    expect(bus.notices('c1')).toEqual(['Username cannot be that long']);
    expect(engine.registry.get('c1')?.username).toBe(grin.repeat(29));
  });

  it('falls back to black for an unusable color', async () => {
    const { login, engine } = createHarness();

    await login('c1', { username: 'alice', streamer: 'bob', color: 'blurple' });

    expect(engine.registry.get('c1')?.color).toBe(0);
  });

  it('reports unexpected failures as an internal error', async () => {
    const { bus, login, store } = createHarness();
    vi.spyOn(store, 'lookupStreamer').mockRejectedValue(new Error('disk gone'));

    await login('c1', { username: 'alice', streamer: 'bob' });

    expect(bus.received('c1')).toEqual([{ event: 'error', payload: { msg: 'Internal server error' } }]);
  });
});

describe('ChatEngine connection events', () => {
  it('counts anonymous presence pings within the window', async () => {
    const { engine, clock } = createHarness();

    await engine.dispatch({ type: 'presence', connectionId: 'v1', payload: { streamer: 'Bob' } });
    await engine.dispatch({ type: 'presence', connectionId: 'v2', payload: { streamer: 'bob' } });
    expect(engine.viewerCount('BOB')).toBe(2);

    clock.now += 31;
    expect(engine.viewerCount('bob')).toBe(0);
  });

  it('rejects a presence ping without a streamer', async () => {
    const { bus, engine } = createHarness();

    await engine.dispatch({ type: 'presence', connectionId: 'v1', payload: {} });

    expect(bus.notices('v1')).toEqual(['Streamer missing from payload']);
  });

  it('announces departures and drops presence on disconnect', async () => {
    const { bus, login, engine } = createHarness();
    await login('c-alice', { username: 'alice', streamer: 'bob', color: 'blue' });
    await login('c-carol', { username: 'carol', streamer: 'bob' });
    bus.clear();

    await engine.dispatch({ type: 'disconnect', connectionId: 'c-carol' });

    expect(bus.received('c-alice')).toEqual([
      {
        event: 'disconnected',
        payload: { username: 'carol', type: 'normal', color: '#000000', users: [alice] }
      }
    ]);
    expect(bus.received('c-carol')).toEqual([]);
    expect(bus.members('bob')).toEqual(['c-alice']);
    expect(engine.viewerCount('bob')).toBe(1);
  });

  it('disconnects anonymous connections silently', async () => {
    const { bus, engine } = createHarness();
    await engine.dispatch({ type: 'presence', connectionId: 'v1', payload: { streamer: 'bob' } });

    await engine.dispatch({ type: 'disconnect', connectionId: 'v1' });

    expect(bus.deliveries).toEqual([]);
    expect(engine.viewerCount('bob')).toBe(0);
  });

  it('clears a stale session when a connection id is reused', async () => {
    const { login, engine } = createHarness();
    await login('c1', { username: 'alice', streamer: 'bob' });

    await engine.dispatch({ type: 'connect', connectionId: 'c1', address: '10.0.0.2' });

    expect(engine.registry.has('c1')).toBe(false);
  });

  it('returns the session color on request', async () => {
    const { bus, login, engine } = createHarness();
    await engine.dispatch({ type: 'get color', connectionId: 'c1' });
    await login('c1', { username: 'alice', streamer: 'bob', color: '#abc' });
    bus.clear();

    await engine.dispatch({ type: 'get color', connectionId: 'c1' });

    expect(bus.received('c1')).toEqual([{ event: 'return color', payload: { color: '#aabbcc' } }]);
  });

  it('rejects get color before login', async () => {
    const { bus, engine } = createHarness();

    await engine.dispatch({ type: 'get color', connectionId: 'c1' });

    expect(bus.notices('c1')).toEqual(['User is not authenticated']);
  });
});

describe('ChatEngine drawings', () => {
  it('broadcasts a drawing with the sender identity', async () => {
    const { bus, login, engine } = createHarness();
    await login('c-alice', { username: 'alice', streamer: 'bob', color: 'blue' });
    await login('c-carol', { username: 'carol', streamer: 'bob' });
    bus.clear();

    await engine.dispatch({ type: 'drawing', connectionId: 'c-alice', payload: { src: ' data:image/png;base64,AAAA ' } });

    const line = { event: 'drawing received', payload: { ...alice, src: 'data:image/png;base64,AAAA' } };
    expect(bus.received('c-alice')).toEqual([line]);
    expect(bus.received('c-carol')).toEqual([line]);
  });

  it('requires an image', async () => {
    const { bus, login, engine } = createHarness();
    await login('c1', { username: 'alice', streamer: 'bob' });
    bus.clear();

    await engine.dispatch({ type: 'drawing', connectionId: 'c1', payload: {} });

    expect(bus.received('c1')).toEqual([{ event: 'error', payload: { msg: 'Image missing from payload' } }]);
  });

  it('blocks drawings from muted users', async () => {
    const { bus, login, engine } = createHarness();
    await login('c1', { username: 'alice', streamer: 'bob' });
    engine.registry.mutate('c1', () => ({ muted: true }));
    bus.clear();

    await engine.dispatch({ type: 'drawing', connectionId: 'c1', payload: { src: 'data:' } });

    expect(bus.received('c1')).toEqual([{ event: 'server', payload: { msg: 'You are muted!' } }]);
  });
});
