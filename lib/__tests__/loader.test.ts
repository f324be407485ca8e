import { Loader, LoadResult, sharedFetchEngine } from '..';
import { MockFetchEngine, createMockFetchEngine } from './helpers/mocks';

describe('loader', () => {
    const url = new URL('https://api.example.com/items/7');

    describe('load', () => {
        it('should deliver the payload as a data result', () => {
            const payload = Buffer.from([1, 2, 3]);
            const loader = new Loader(new MockFetchEngine({ payload }));
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);

            expect(completionHandler).toHaveBeenCalledTimes(1);
            expect(completionHandler).toHaveBeenCalledWith({ kind: 'data', data: payload });
        });

        it('should deliver the failure as an error result', () => {
            const failure = new Error('Network error');
            const loader = new Loader(new MockFetchEngine({ failure }));
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);

            expect(completionHandler).toHaveBeenCalledTimes(1);
            const result: LoadResult = completionHandler.mock.calls[0][0];
            expect(result.kind).toBe('error');
            expect(result).toEqual({ kind: 'error', error: failure });
            if (result.kind === 'error') {
                expect(result.error).toBe(failure);
            }
        });

        it('should prefer the failure when the engine reports both a payload and a failure', () => {
            const failure = new Error('Connection reset');
            const loader = new Loader(new MockFetchEngine({ payload: Buffer.from('partial'), failure }));
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);

            expect(completionHandler).toHaveBeenCalledTimes(1);
            expect(completionHandler).toHaveBeenCalledWith({ kind: 'error', error: failure });
        });

        it('should deliver an empty payload when the engine reports neither payload nor failure', () => {
            const loader = new Loader(new MockFetchEngine());
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);

            expect(completionHandler).toHaveBeenCalledTimes(1);
            const result: LoadResult = completionHandler.mock.calls[0][0];
            expect(result.kind).toBe('data');
            if (result.kind === 'data') {
                expect(result.data).toEqual(Buffer.alloc(0));
                expect(result.data.length).toBe(0);
            }
        });

        it('should ignore response metadata', () => {
            const payload = Buffer.from('ok');
            const loader = new Loader(new MockFetchEngine({
                payload,
                metadata: { status: 200, statusText: 'OK', headers: { 'content-type': 'text/plain' } },
            }));
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);

            expect(completionHandler).toHaveBeenCalledWith({ kind: 'data', data: payload });
        });

        it('should pass the exact URL to the engine', () => {
            const engine = new MockFetchEngine({ payload: Buffer.from('x') });
            const loader = new Loader(engine);

            loader.load(url, jest.fn());

            expect(engine.lastRequestedUrl).toBe(url);
            expect(engine.requestCount).toBe(1);
        });

        it('should load "Hello world" from a mocked API', () => {
            const engine = new MockFetchEngine({ payload: Buffer.from('Hello world') });
            const loader = new Loader(engine);
            const apiUrl = new URL('my/API', 'https://example.com/');
            const completionHandler = jest.fn();

            loader.load(apiUrl, completionHandler);

            expect(engine.lastRequestedUrl).toBe(apiUrl);
            expect(engine.lastRequestedUrl?.href).toBe('https://example.com/my/API');
            expect(completionHandler).toHaveBeenCalledWith({ kind: 'data', data: Buffer.from('Hello world') });
        });

        it('should deliver the result on the context the engine calls back on', () => {
            const engine = createMockFetchEngine();
            const loader = new Loader(engine);
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);
            expect(completionHandler).not.toHaveBeenCalled();

            const [, engineCallback] = engine.performRequest.mock.calls[0];
            engineCallback(Buffer.from('late'), null, null);

            expect(completionHandler).toHaveBeenCalledWith({ kind: 'data', data: Buffer.from('late') });
        });

        it('should never call back when the engine never completes', () => {
            const engine = createMockFetchEngine();
            const loader = new Loader(engine);
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);

            expect(engine.performRequest).toHaveBeenCalledWith(url, expect.any(Function));
            expect(completionHandler).not.toHaveBeenCalled();
        });

        it('should honor only the first completion when the engine calls back repeatedly', () => {
            const consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
            const engine = createMockFetchEngine();
            const loader = new Loader(engine);
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);
            const [, engineCallback] = engine.performRequest.mock.calls[0];
            engineCallback(Buffer.from('first'), null, null);
            engineCallback(null, null, new Error('second'));
            engineCallback(Buffer.from('third'), null, null);

            expect(completionHandler).toHaveBeenCalledTimes(1);
            expect(completionHandler).toHaveBeenCalledWith({ kind: 'data', data: Buffer.from('first') });
            expect(consoleWarnSpy).toHaveBeenCalledTimes(2);
            expect(consoleWarnSpy).toHaveBeenCalledWith('Ignoring repeated completion for https://api.example.com/items/7');

            consoleWarnSpy.mockRestore();
        });

        it('should keep concurrent loads independent', () => {
            const engine = createMockFetchEngine();
            const loader = new Loader(engine);
            const first = jest.fn();
            const second = jest.fn();

            loader.load(new URL('https://example.com/a'), first);
            loader.load(new URL('https://example.com/b'), second);

            const [, firstCallback] = engine.performRequest.mock.calls[0];
            const [, secondCallback] = engine.performRequest.mock.calls[1];
            secondCallback(Buffer.from('b'), null, null);
            firstCallback(null, null, new Error('a failed'));

            expect(first).toHaveBeenCalledWith({ kind: 'error', error: new Error('a failed') });
            expect(second).toHaveBeenCalledWith({ kind: 'data', data: Buffer.from('b') });
        });

        it('should hand out immutable results', () => {
            const loader = new Loader(new MockFetchEngine({ payload: Buffer.from('frozen') }));
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);

            expect(Object.isFrozen(completionHandler.mock.calls[0][0])).toBe(true);
        });

        it('should keep the delivered bytes when the engine reuses its buffer', () => {
            const payload = Buffer.from('Hello world');
            const loader = new Loader(new MockFetchEngine({ payload }));
            const completionHandler = jest.fn();

            loader.load(url, completionHandler);
            payload.write('J');

            const result: LoadResult = completionHandler.mock.calls[0][0];
            expect(result.kind).toBe('data');
            if (result.kind === 'data') {
                expect(result.data.toString()).toBe('Hello world');
            }
        });
    });

    describe('loadAsync', () => {
        it('should resolve with a data result', async () => {
            const loader = new Loader(new MockFetchEngine({ payload: Buffer.from('async') }));

            await expect(loader.loadAsync(url)).resolves.toEqual({ kind: 'data', data: Buffer.from('async') });
        });

        it('should resolve, not reject, with an error result', async () => {
            const failure = new Error('Request failed with status code 500');
            const loader = new Loader(new MockFetchEngine({ failure }));

            await expect(loader.loadAsync(url)).resolves.toEqual({ kind: 'error', error: failure });
        });
    });

    describe('construction', () => {
        it('should default to the shared engine', () => {
            const loader = new Loader();

            expect(loader.engine).toBe(sharedFetchEngine());
        });

        it('should share one default engine between loaders', () => {
            expect(new Loader().engine).toBe(new Loader().engine);
        });

        it('should use an injected engine', () => {
            const engine = new MockFetchEngine();

            expect(new Loader(engine).engine).toBe(engine);
        });
    });
});
