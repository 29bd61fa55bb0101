import { beforeEach, describe, expect, it, vi } from 'vitest';

import { AntigateProvider } from '../src/captcha/providers/antigate.js';
import { BrotherhoodProvider } from '../src/captcha/providers/brotherhood.js';
import { DeathByCaptchaProvider } from '../src/captcha/providers/deathByCaptcha.js';
import { NineKwProvider } from '../src/captcha/providers/nineKw.js';
import type { CaptchaImage } from '../src/captcha/types.js';
import { succeedVoid } from '../src/engine/outcome.js';
import type { WaitFn } from '../src/engine/waitBudget.js';
import type { FetchLike } from '../src/network/http.js';
import { setOutputConfig } from '../src/util/output.js';

const IMAGE: CaptchaImage = { path: '/tmp/captcha.img', bytes: Buffer.from('captcha-bytes') };
const HINT = { type: 'digit' };

type Route = (url: URL, init?: RequestInit) => Response | undefined;

/** Answers from the first matching route; every request is recorded. */
function fakeHttp(...routes: Route[]) {
  return vi.fn<FetchLike>(async (input, init) => {
    const url = new URL(input);
    for (const route of routes) {
      const response = route(url, init);
      if (response) {
        return response;
      }
    }
    throw new Error(`unexpected request: ${input}`);
  });
}

function sequence(bodies: string[]): () => Response {
  let index = 0;
  return () => {
    const body = bodies[Math.min(index, bodies.length - 1)];
    index += 1;
    return new Response(body);
  };
}

function fakeWait() {
  return vi.fn<WaitFn>(async () => succeedVoid());
}

function requestedUrls(http: ReturnType<typeof fakeHttp>): string[] {
  return http.mock.calls.map(([input]) => input);
}

beforeEach(() => {
  setOutputConfig({ verbosity: 0 });
});

describe('AntigateProvider', () => {
  it('uploads, polls until ready and returns a ticket', async () => {
    const poll = sequence(['CAPCHA_NOT_READY', 'OK|hello']);
    const http = fakeHttp(
      (url) => (url.pathname === '/in.php' ? new Response('OK|123') : undefined),
      (url) => (url.searchParams.get('action') === 'get' ? poll() : undefined),
    );
    const wait = fakeWait();

    const result = await new AntigateProvider('test-secret', http).solve(IMAGE, HINT, wait);

    expect(result).toEqual({ ok: true, value: { word: 'hello', ticket: { providerTag: 'a', transactionId: '123' } } });
    expect(wait.mock.calls).toEqual([[8], [5]]);
    expect(requestedUrls(http)[1]).toBe('http://antigate.com/res.php?key=test-secret&action=get&id=123');
  });

  it('retries later when no slot is available', async () => {
    const http = fakeHttp(() => new Response('ERROR_NO_SLOT_AVAILABLE'));
    const result = await new AntigateProvider('test-secret', http).solve(IMAGE, HINT, fakeWait());
    expect(result).toEqual({ ok: false, kind: 'captcha' });
  });

  it('is fatal on a zero balance upload answer', async () => {
    const http = fakeHttp(() => new Response('ERROR_ZERO_BALANCE'));
    const result = await new AntigateProvider('test-secret', http).solve(IMAGE, HINT, fakeWait());
    expect(result).toEqual({ ok: false, kind: 'fatal' });
  });

  it('treats an empty upload answer as a network failure', async () => {
    const http = fakeHttp(() => new Response(''));
    const result = await new AntigateProvider('test-secret', http).solve(IMAGE, HINT, fakeWait());
    expect(result).toEqual({ ok: false, kind: 'network' });
  });

  it('gives up as captcha once the poll ladder is exhausted', async () => {
    const http = fakeHttp(
      (url) => (url.pathname === '/in.php' ? new Response('OK|9') : undefined),
      () => new Response('CAPCHA_NOT_READY'),
    );
    const wait = fakeWait();

    const result = await new AntigateProvider('test-secret', http).solve(IMAGE, HINT, wait);

    expect(result).toEqual({ ok: false, kind: 'captcha' });
    expect(wait.mock.calls.map(([seconds]) => seconds)).toEqual([8, 5, 5, 6, 6, 7, 7, 8]);
  });

  it('stops polling when the wait budget runs out', async () => {
    const http = fakeHttp(
      (url) => (url.pathname === '/in.php' ? new Response('OK|9') : undefined),
      () => new Response('CAPCHA_NOT_READY'),
    );
    const wait = vi.fn<WaitFn>(async () => ({ ok: false, kind: 'max-wait-reached' }));

    const result = await new AntigateProvider('test-secret', http).solve(IMAGE, HINT, wait);

    expect(result).toEqual({ ok: false, kind: 'max-wait-reached' });
    expect(http).toHaveBeenCalledTimes(1);
  });

  it('checks the balance', async () => {
    expect(await new AntigateProvider('test-secret', fakeHttp(() => new Response('12.3400'))).checkBalance()).toEqual({
      ok: true,
      value: undefined,
    });
    expect(await new AntigateProvider('test-secret', fakeHttp(() => new Response('0.0000'))).checkBalance()).toEqual({
      ok: false,
      kind: 'fatal',
    });
    expect(
      await new AntigateProvider('test-secret', fakeHttp(() => new Response('<h1>502 Bad Gateway</h1>'))).checkBalance(),
    ).toEqual({ ok: false, kind: 'captcha' });
  });

  it('reports the service as down when the balance request fails', async () => {
    const result = await new AntigateProvider('test-secret', fakeHttp()).checkBalance();
    expect(result.ok ? undefined : result.kind).toBe('network');
  });

  it('reports bad answers', async () => {
    const http = fakeHttp(() => new Response('OK_REPORT_RECORDED'));
    await new AntigateProvider('test-secret', http).nack('55');
    expect(requestedUrls(http)).toEqual(['http://antigate.com/res.php?key=test-secret&action=reportbad&id=55']);
  });
});

describe('NineKwProvider', () => {
  it('polls until data arrives', async () => {
    const poll = sequence(['NO DATA', '', 'w0rd']);
    const http = fakeHttp(
      (_url, init) => (init?.method === 'POST' ? new Response('8811') : undefined),
      () => poll(),
    );
    const wait = fakeWait();

    const result = await new NineKwProvider('test-secret', http).solve(IMAGE, HINT, wait);

    expect(result).toEqual({ ok: true, value: { word: 'w0rd', ticket: { providerTag: '9', transactionId: '8811' } } });
    expect(wait.mock.calls.map(([seconds]) => seconds)).toEqual([8, 5, 5]);
  });

  it('is fatal on a numbered remote error', async () => {
    const http = fakeHttp(() => new Response('0002 API Key ungueltig'));
    const result = await new NineKwProvider('test-secret', http).solve(IMAGE, HINT, fakeWait());
    expect(result).toEqual({ ok: false, kind: 'fatal' });
  });

  it('is fatal without credits', async () => {
    const http = fakeHttp(() => new Response('0011 Guthaben ist nicht ausreichend'));
    expect(await new NineKwProvider('test-secret', http).checkBalance()).toEqual({ ok: false, kind: 'fatal' });
  });

  it('acks and nacks through the correct-back call', async () => {
    const http = fakeHttp(() => new Response('OK'));
    const provider = new NineKwProvider('test-secret', http);

    await provider.ack('1');
    await provider.nack('2');

    expect(requestedUrls(http).map((url) => new URL(url).searchParams.get('correct'))).toEqual(['1', '2']);
  });
});

describe('BrotherhoodProvider', () => {
  it('needs at least 10 credits', async () => {
    const low = fakeHttp(() => new Response('OK-9'));
    const enough = fakeHttp(() => new Response('OK-10'));

    expect(await new BrotherhoodProvider('user:test-secret', low).checkBalance()).toEqual({ ok: false, kind: 'fatal' });
    expect((await new BrotherhoodProvider('user:test-secret', enough).checkBalance()).ok).toBe(true);
    expect(new URL(requestedUrls(low)[0] ?? '').searchParams.get('username')).toBe('user');
  });

  it('polls until answered', async () => {
    const poll = sequence(['OK-on user', 'OK-answered-brother']);
    const http = fakeHttp(
      (url) => (url.pathname === '/sendNewCaptcha.aspx' ? new Response('OK-abc') : undefined),
      (url) => (url.pathname === '/askCaptchaResult.aspx' ? poll() : undefined),
    );

    const result = await new BrotherhoodProvider('user:test-secret', http).solve(IMAGE, HINT, fakeWait());

    expect(result).toEqual({
      ok: true,
      value: { word: 'brother', ticket: { providerTag: 'b', transactionId: 'abc' } },
    });
  });

  it('is fatal once the poll ladder is exhausted', async () => {
    const http = fakeHttp(
      (url) => (url.pathname === '/sendNewCaptcha.aspx' ? new Response('OK-abc') : undefined),
      () => new Response('OK-waiting'),
    );
    const result = await new BrotherhoodProvider('user:test-secret', http).solve(IMAGE, HINT, fakeWait());
    expect(result).toEqual({ ok: false, kind: 'fatal' });
  });

  it('rejects an account without password', () => {
    expect(() => new BrotherhoodProvider('user', fakeHttp())).toThrow('captchabrotherhood: account must be given as USER:PASSWORD');
  });
});

describe('DeathByCaptchaProvider', () => {
  it('follows the poll location until the text is known', async () => {
    const poll = sequence([
      JSON.stringify({ status: 0, captcha: 31, is_correct: true, text: '' }),
      JSON.stringify({ status: 0, captcha: 31, is_correct: true, text: 'dbc' }),
    ]);
    const http = fakeHttp(
      (url, init) =>
        url.pathname === '/api/captcha' && init?.method === 'POST'
          ? new Response(null, { status: 303, headers: { location: '/api/captcha/31' } })
          : undefined,
      (url) => (url.pathname === '/api/captcha/31' ? poll() : undefined),
    );

    const result = await new DeathByCaptchaProvider('user:test-secret', http).solve(IMAGE, HINT, fakeWait());

    expect(result).toEqual({ ok: true, value: { word: 'dbc', ticket: { providerTag: 'd', transactionId: '31' } } });
    expect(requestedUrls(http)[1]).toBe('http://api.dbcapi.me/api/captcha/31');
  });

  it('fails with captcha on anything but a 303', async () => {
    const http = fakeHttp(() => new Response('{}', { status: 200 }));
    const result = await new DeathByCaptchaProvider('user:test-secret', http).solve(IMAGE, HINT, fakeWait());
    expect(result).toEqual({ ok: false, kind: 'captcha' });
  });

  it('is fatal for banned accounts or an empty balance', async () => {
    const banned = fakeHttp(() => new Response(JSON.stringify({ status: 0, is_banned: true, balance: 100 })));
    const empty = fakeHttp(() => new Response(JSON.stringify({ status: 0, is_banned: false, balance: 0.4 })));
    const funded = fakeHttp(() => new Response(JSON.stringify({ status: 0, is_banned: false, balance: 250.5 })));

    expect(await new DeathByCaptchaProvider('user:test-secret', banned).checkBalance()).toEqual({ ok: false, kind: 'fatal' });
    expect(await new DeathByCaptchaProvider('user:test-secret', empty).checkBalance()).toEqual({ ok: false, kind: 'fatal' });
    expect((await new DeathByCaptchaProvider('user:test-secret', funded).checkBalance()).ok).toBe(true);
  });

  it('is fatal on status 255', async () => {
    const http = fakeHttp(() => new Response(JSON.stringify({ status: 255, error: 'not-logged-in' })));
    expect(await new DeathByCaptchaProvider('user:test-secret', http).checkBalance()).toEqual({ ok: false, kind: 'fatal' });
  });

  it('reports bad answers', async () => {
    const http = fakeHttp(() => new Response(JSON.stringify({ status: 0 })));
    await new DeathByCaptchaProvider('user:test-secret', http).nack('31');
    expect(requestedUrls(http)).toEqual(['http://api.dbcapi.me/api/captcha/31/report']);
  });
});
