import { describe, it, expect, vi } from 'vitest';
import { WebProvider, FetchFunction } from './web-provider';
import { htmlToText } from './html-text';
import { createRequest } from '../../tests/fixtures/requests';

function respondWith(body: string, init: ResponseInit = {}): FetchFunction {
  return vi.fn(async () => new Response(body, init));
}

describe('WebProvider', () => {
  it('should reduce HTML to text by default', async () => {
    const fetch = respondWith('<html><body><h1>Title</h1><p>Hello &amp; welcome</p></body></html>', {
      status: 200,
      headers: { 'content-type': 'text/html; charset=utf-8' },
    });
    const provider = new WebProvider({ fetch, timeoutMs: 1000 });

    const output = await provider.invoke(createRequest('fetch_url', { url: 'https://example.com' }));

    expect(output).toEqual({
      url: 'https://example.com/',
      status: 200,
      contentType: 'text/html; charset=utf-8',
      content: 'Title\nHello & welcome',
      length: 21,
    });
  });

  it('should return raw HTML when textOnly is false', async () => {
    const html = '<p>raw</p>';
    const provider = new WebProvider({
      fetch: respondWith(html, { headers: { 'content-type': 'text/html' } }),
      timeoutMs: 1000,
    });

    const output = await provider.invoke(
      createRequest('fetch_url', { url: 'https://example.com/page', textOnly: false })
    );

    expect(output.content).toBe(html);
  });

  it('should reject non-http URLs without fetching', async () => {
    const fetch = respondWith('');
    const provider = new WebProvider({ fetch, timeoutMs: 1000 });

    await expect(
      provider.invoke(createRequest('fetch_url', { url: 'file:///etc/passwd' }))
    ).rejects.toMatchObject({ kind: 'VALIDATION', message: 'URL must use http or https: file:///etc/passwd' });
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should treat 429 and 5xx as unavailable', async () => {
    for (const status of [429, 503]) {
      const provider = new WebProvider({ fetch: respondWith('busy', { status }), timeoutMs: 1000 });
      await expect(
        provider.invoke(createRequest('fetch_url', { url: 'https://example.com/' }))
      ).rejects.toMatchObject({ kind: 'UNAVAILABLE', message: `HTTP ${status} from https://example.com/` });
    }
  });

  it('should reject other client errors', async () => {
    const provider = new WebProvider({ fetch: respondWith('gone', { status: 404 }), timeoutMs: 1000 });

    await expect(
      provider.invoke(createRequest('fetch_url', { url: 'https://example.com/missing' }))
    ).rejects.toMatchObject({ kind: 'REJECTED', message: 'HTTP 404 from https://example.com/missing' });
  });

  it('should report network failures as transport errors', async () => {
    const fetch: FetchFunction = vi.fn(async () => {
      throw new TypeError('fetch failed');
    });
    const provider = new WebProvider({ fetch, timeoutMs: 1000 });

    await expect(
      provider.invoke(createRequest('fetch_url', { url: 'https://example.com/' }))
    ).rejects.toMatchObject({ kind: 'TRANSPORT', message: 'Request to https://example.com/ failed: fetch failed' });
  });

  it('should time out using the shorter of the two deadlines', async () => {
    const fetch: FetchFunction = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const provider = new WebProvider({ fetch, timeoutMs: 10_000 });

    await expect(
      provider.invoke(createRequest('fetch_url', { url: 'https://example.com/' }, { timeoutMs: 20 }))
    ).rejects.toMatchObject({ kind: 'TIMEOUT', message: 'Request to https://example.com/ timed out after 20ms' });
  });
});

describe('htmlToText', () => {
  it('should drop scripts and styles', () => {
    const html = '<style>p{}</style><script>alert(1)</script><div>Visible</div>';
    expect(htmlToText(html)).toBe('Visible');
  });

  it('should split phrases separated by wide gaps', () => {
    expect(htmlToText('<td>Name</td>   <td>Value</td>')).toBe('Name\nValue');
  });

  it('should decode numeric entities', () => {
    expect(htmlToText('caf&#233; &#x41; ok')).toBe('café A ok');
  });
});
