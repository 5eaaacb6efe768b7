import { LazyClientRegistry } from '../../../src/domain/clients/LazyClientRegistry';
import {
  DuplicateSlotError,
  InitializationError,
  OperationCancelledError,
  RegistryClosedError,
  RegistrySealedError,
  UnknownSlotError,
} from '../../../src/shared/errors';
import { RecordingLogger, deferred } from '../../helpers/fakes';

interface Clients {
  alpha: { id: string };
  beta: { id: string };
}

function makeRegistry() {
  const log = new RecordingLogger();
  const registry = new LazyClientRegistry<Clients>(log);
  return { log, registry };
}

describe('LazyClientRegistry', () => {
  test('declaring slots constructs nothing', () => {
    const { registry } = makeRegistry();
    const alpha = jest.fn(() => ({ id: 'a' }));
    registry.declare('alpha', alpha);

    expect(alpha).not.toHaveBeenCalled();
    expect(registry.describe()).toEqual([{ name: 'alpha', status: 'uninitialized', attempts: 0 }]);
  });

  test('rejects duplicate declarations', () => {
    const { registry } = makeRegistry();
    registry.declare('alpha', () => ({ id: 'a' }));
    expect(() => registry.declare('alpha', () => ({ id: 'b' }))).toThrow(DuplicateSlotError);
  });

  test('slot names that match object members are ordinary names', async () => {
    const registry = new LazyClientRegistry<{ constructor: { id: string }; toString: { id: string } }>(
      new RecordingLogger()
    );
    registry.declare('constructor', () => ({ id: 'c' }));

    expect(registry.describe()).toEqual([{ name: 'constructor', status: 'uninitialized', attempts: 0 }]);
    expect(registry.peek('constructor')).toBeUndefined();
    await expect(registry.ensureReady(['toString'])).rejects.toBeInstanceOf(UnknownSlotError);

    const clients = await registry.ensureReady(['constructor']);
    expect(clients.get('constructor')).toEqual({ id: 'c' });
    expect(() => registry.declare('constructor', () => ({ id: 'd' }))).toThrow(DuplicateSlotError);
  });

  test('a "__proto__" slot is stored like any other', async () => {
    const registry = new LazyClientRegistry<{ __proto__: { id: string } }>(new RecordingLogger());
    registry.declare('__proto__', () => ({ id: 'p' }));

    const clients = await registry.ensureReady(['__proto__']);
    expect(clients.get('__proto__')).toEqual({ id: 'p' });
  });

  test('a constructor that resolves to nothing fails initialization', async () => {
    const registry = new LazyClientRegistry<{ empty: { id: string } | undefined }>(new RecordingLogger());
    registry.declare('empty', () => undefined);

    await expect(registry.ensureReady(['empty'])).rejects.toMatchObject({
      slot: 'empty',
      causeMessage: 'Constructor resolved without a client.',
    });
    expect(registry.describe()[0]).toMatchObject({ status: 'failed' });
  });

  test('ensureReady constructs only the requested slots', async () => {
    const { registry } = makeRegistry();
    const alpha = jest.fn(() => ({ id: 'a' }));
    const beta = jest.fn(() => ({ id: 'b' }));
    registry.declare('alpha', alpha).declare('beta', beta);

    const clients = await registry.ensureReady(['alpha']);

    expect(clients.get('alpha')).toEqual({ id: 'a' });
    expect(alpha).toHaveBeenCalledTimes(1);
    expect(beta).not.toHaveBeenCalled();
    expect(registry.describe().map((slot) => slot.status)).toEqual(['ready', 'uninitialized']);
  });

  test('deduplicates repeated names in one request', async () => {
    const { registry } = makeRegistry();
    const alpha = jest.fn(() => ({ id: 'a' }));
    registry.declare('alpha', alpha);

    await registry.ensureReady(['alpha', 'alpha']);
    expect(alpha).toHaveBeenCalledTimes(1);
  });

  test('concurrent callers share a single construction', async () => {
    const { registry } = makeRegistry();
    const gate = deferred<{ id: string }>();
    const alpha = jest.fn(() => gate.promise);
    registry.declare('alpha', alpha);

    const first = registry.ensureReady(['alpha']);
    const second = registry.ensureReady(['alpha']);
    gate.resolve({ id: 'a' });

    const [one, two] = await Promise.all([first, second]);
    expect(one.get('alpha')).toBe(two.get('alpha'));
    expect(alpha).toHaveBeenCalledTimes(1);
  });

  test('constructs different slots independently', async () => {
    const { registry } = makeRegistry();
    const gate = deferred<{ id: string }>();
    registry.declare('alpha', () => gate.promise).declare('beta', () => ({ id: 'b' }));

    const pendingAlpha = registry.ensureReady(['alpha']);
    const beta = await registry.ensureReady(['beta']);

    expect(beta.get('beta')).toEqual({ id: 'b' });
    expect(registry.describe().map((slot) => slot.status)).toEqual(['initializing', 'ready']);

    gate.resolve({ id: 'a' });
    await pendingAlpha;
  });

  test('a failed slot raises InitializationError and is retried later', async () => {
    const { registry } = makeRegistry();
    const alpha = jest
      .fn<{ id: string }, []>()
      .mockImplementationOnce(() => {
        throw new Error('missing WEAVIATE_URL');
      })
      .mockImplementationOnce(() => ({ id: 'a' }));
    registry.declare('alpha', alpha);

    await expect(registry.ensureReady(['alpha'])).rejects.toMatchObject({
      slot: 'alpha',
      causeMessage: 'missing WEAVIATE_URL',
    });
    expect(registry.describe()[0]).toMatchObject({ status: 'failed', lastError: 'missing WEAVIATE_URL' });

    const clients = await registry.ensureReady(['alpha']);
    expect(clients.get('alpha')).toEqual({ id: 'a' });
    expect(registry.describe()[0]).toMatchObject({ status: 'ready', attempts: 2 });
  });

  test('reports the first failing slot in request order', async () => {
    const { registry } = makeRegistry();
    registry
      .declare('alpha', () => Promise.reject(new Error('alpha down')))
      .declare('beta', () => Promise.reject(new Error('beta down')));

    const failure = registry.ensureReady(['beta', 'alpha']);
    await expect(failure).rejects.toBeInstanceOf(InitializationError);
    await expect(failure).rejects.toMatchObject({ slot: 'beta' });
    expect(registry.describe().map((slot) => slot.status)).toEqual(['failed', 'failed']);
  });

  test('an unknown slot is a programming error', async () => {
    const { registry } = makeRegistry();
    registry.declare('alpha', () => ({ id: 'a' }));
    await expect(registry.ensureReady(['beta'])).rejects.toBeInstanceOf(UnknownSlotError);
  });

  test('declaring after serving began is rejected', async () => {
    const { registry } = makeRegistry();
    registry.declare('alpha', () => ({ id: 'a' }));
    await registry.ensureReady(['alpha']);
    expect(() => registry.declare('beta', () => ({ id: 'b' }))).toThrow(RegistrySealedError);
  });

  test('a cancelled waiter leaves construction running for others', async () => {
    const { registry } = makeRegistry();
    const gate = deferred<{ id: string }>();
    const alpha = jest.fn(() => gate.promise);
    registry.declare('alpha', alpha);
    const controller = new AbortController();

    const cancelled = registry.ensureReady(['alpha'], { signal: controller.signal });
    const patient = registry.ensureReady(['alpha']);
    controller.abort();
    await expect(cancelled).rejects.toBeInstanceOf(OperationCancelledError);

    gate.resolve({ id: 'a' });
    await expect(patient).resolves.toBeDefined();
    expect(alpha).toHaveBeenCalledTimes(1);
  });

  test('peek never constructs', async () => {
    const { registry } = makeRegistry();
    const alpha = jest.fn(() => ({ id: 'a' }));
    registry.declare('alpha', alpha);

    expect(registry.peek('alpha')).toBeUndefined();
    expect(alpha).not.toHaveBeenCalled();
    await registry.ensureReady(['alpha']);
    expect(registry.peek('alpha')).toEqual({ id: 'a' });
  });

  test('close disposes ready handles and refuses further work', async () => {
    const { registry, log } = makeRegistry();
    const disposeAlpha = jest.fn(async () => undefined);
    const disposeBeta = jest.fn(async () => {
      throw new Error('already gone');
    });
    registry
      .declare('alpha', () => ({ id: 'a' }), { dispose: disposeAlpha })
      .declare('beta', () => ({ id: 'b' }), { dispose: disposeBeta });
    const clients = await registry.ensureReady(['alpha', 'beta']);

    await registry.close();

    expect(disposeAlpha).toHaveBeenCalledWith({ id: 'a' });
    expect(disposeBeta).toHaveBeenCalledWith({ id: 'b' });
    expect(log.entries.filter((entry) => entry.level === 'warn')).toEqual([
      { level: 'warn', message: 'Failed to release client', meta: { slot: 'beta', error: 'already gone' } },
    ]);
    expect(() => clients.get('alpha')).toThrow(RegistryClosedError);
    await expect(registry.ensureReady(['alpha'])).rejects.toBeInstanceOf(RegistryClosedError);
  });

  test('close is idempotent', async () => {
    const { registry } = makeRegistry();
    const dispose = jest.fn();
    registry.declare('alpha', () => ({ id: 'a' }), { dispose });
    await registry.ensureReady(['alpha']);

    await registry.close();
    await registry.close();
    expect(dispose).toHaveBeenCalledTimes(1);
  });
});
