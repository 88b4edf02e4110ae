import { createIntegrations, ProviderError } from '../src/integrations';
import { mockFetch, testConfig } from './helpers';

describe('integration adapters without credentials', () => {
  const { fetchImpl, calls } = mockFetch();
  const integrations = createIntegrations(testConfig(), fetchImpl);

  it('skips social publishing and echoes the post', async () => {
    const post = { channel: 'linkedin', text: 'hi', tags: ['launch'] };
    const out = await integrations.publishSocial(post);
    expect(out.status).toBe('skipped');
    expect(out.reason).toBe('OCOYA_API_KEY not set');
    expect(out.payload).toBe(post);
  });

  it('skips the CRM upsert and echoes the contact', async () => {
    const contact = { email: 'a@b.com', tags: ['lead_generated'] };
    const out = await integrations.upsertContact(contact);
    expect(out).toEqual({ status: 'skipped', reason: 'SYSTEME_API_KEY not set', payload: contact });
    expect(out.payload).toBe(contact);
  });

  it('skips email delivery', async () => {
    const message = { to: 'ops@example.com', subject: 'Hello', html: '<p>hi</p>' };
    expect(await integrations.sendEmail(message)).toEqual({ status: 'skipped', reason: 'GMAIL_API_KEY not set', payload: message });
  });

  it('skips the OAuth exchange', async () => {
    expect(await integrations.exchangeOAuthCode('abc')).toEqual({
      status: 'skipped',
      reason: 'OAUTH_CLIENT_ID not set',
      payload: { code: 'abc' }
    });
  });

  it('skips video generation and search', async () => {
    const request = { prompt: 'a cat' };
    expect(await integrations.generateVideo(request)).toEqual({ status: 'skipped', reason: 'VIDEOAI_API_KEY not set', payload: request });
    expect(await integrations.searchVideos({ q: 'cats' })).toEqual({ status: 'skipped', reason: 'YOUTUBE_API_KEY not set', payload: { q: 'cats' } });
  });

  it('needs both the video key and endpoint', async () => {
    const partial = createIntegrations(testConfig({ VIDEOAI_API_KEY: 'test-key' }), fetchImpl);
    const out = await partial.generateVideo({ prompt: 'a cat' });
    expect(out.reason).toBe('VIDEOAI_ENDPOINT not set');
  });

  it('made no outbound calls', () => {
    expect(calls).toHaveLength(0);
  });
});

describe('integration adapters with credentials', () => {
  it('posts to the social scheduler with a bearer token', async () => {
    const { fetchImpl, calls } = mockFetch(() => ({ body: { id: 'post_1' } }));
    const integrations = createIntegrations(
      testConfig({ OCOYA_API_KEY: 'test-key', OCOYA_API_URL: 'https://social.test/schedule' }),
      fetchImpl
    );
    const post = { channel: 'linkedin', text: 'hi' };
    const out = await integrations.publishSocial(post);

    expect(out).toEqual({ status: 'ok', payload: { id: 'post_1' } });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://social.test/schedule');
    expect(calls[0].method).toBe('POST');
    expect(calls[0].headers.get('authorization')).toBe('Bearer test-key');
    expect(JSON.parse(calls[0].body)).toEqual(post);
  });

  it('creates the CRM contact then applies each tag', async () => {
    const { fetchImpl, calls } = mockFetch((call) =>
      call.url.endsWith('/contacts') ? { body: { id: 77, email: 'a@b.com' } } : { body: {} }
    );
    const integrations = createIntegrations(
      testConfig({ SYSTEME_API_KEY: 'test-key', SYSTEME_API_URL: 'https://crm.test/api' }),
      fetchImpl
    );
    const out = await integrations.upsertContact({ email: 'a@b.com', tags: ['lead_generated', 'vip'] });

    expect(calls.map((c) => c.url)).toEqual([
      'https://crm.test/api/contacts',
      'https://crm.test/api/contacts/77/tags',
      'https://crm.test/api/contacts/77/tags'
    ]);
    expect(calls[0].headers.get('x-api-key')).toBe('test-key');
    expect(JSON.parse(calls[0].body)).toEqual({ email: 'a@b.com' });
    expect(calls.slice(1).map((c) => JSON.parse(c.body))).toEqual([{ tagName: 'lead_generated' }, { tagName: 'vip' }]);
    expect(out).toEqual({ status: 'ok', payload: { contact: { id: 77, email: 'a@b.com' }, tags: ['lead_generated', 'vip'] } });
  });

  it('sends email through the relay from the report sender', async () => {
    const { fetchImpl, calls } = mockFetch(() => ({ status: 202, body: '' }));
    const integrations = createIntegrations(
      testConfig({ GMAIL_API_KEY: 'test-key', EMAIL_RELAY_URL: 'https://mail.test/send' }),
      fetchImpl
    );
    const out = await integrations.sendEmail({ to: 'ops@example.com', subject: 'Hello', html: '<p>hi</p>' });

    expect(out).toEqual({ status: 'ok', payload: {} });
    expect(JSON.parse(calls[0].body)).toEqual({
      personalizations: [{ to: [{ email: 'ops@example.com' }] }],
      from: { email: 'reports@example.com' },
      subject: 'Hello',
      content: [{ type: 'text/html', value: '<p>hi</p>' }]
    });
  });

  it('exchanges an OAuth code with a form-encoded grant', async () => {
    const token = { access_token: 'test-token', token_type: 'Bearer' };
    const { fetchImpl, calls } = mockFetch(() => ({ body: token }));
    const integrations = createIntegrations(
      testConfig({
        OAUTH_CLIENT_ID: 'client-1',
        OAUTH_CLIENT_SECRET: 'test-secret',
        OAUTH_REDIRECT_URI: 'https://app.test/auth/callback',
        OAUTH_TOKEN_URL: 'https://idp.test/token'
      }),
      fetchImpl
    );
    const out = await integrations.exchangeOAuthCode('abc');

    expect(out).toEqual({ status: 'ok', payload: token });
    expect(calls[0].url).toBe('https://idp.test/token');
    expect(calls[0].headers.get('content-type')).toBe('application/x-www-form-urlencoded');
    const form = new URLSearchParams(calls[0].body);
    expect(form.get('grant_type')).toBe('authorization_code');
    expect(form.get('code')).toBe('abc');
    expect(form.get('client_id')).toBe('client-1');
    expect(form.get('redirect_uri')).toBe('https://app.test/auth/callback');
  });

  it('searches videos with the query in the url', async () => {
    const { fetchImpl, calls } = mockFetch(() => ({ body: { items: [] } }));
    const integrations = createIntegrations(
      testConfig({ YOUTUBE_API_KEY: 'test-key', YOUTUBE_API_URL: 'https://search.test/v3/search' }),
      fetchImpl
    );
    const out = await integrations.searchVideos({ q: 'cats & dogs' });

    expect(out).toEqual({ status: 'ok', payload: { items: [] } });
    const url = new URL(calls[0].url);
    expect(url.origin + url.pathname).toBe('https://search.test/v3/search');
    expect(url.searchParams.get('q')).toBe('cats & dogs');
    expect(url.searchParams.get('maxResults')).toBe('10');
    expect(url.searchParams.get('part')).toBe('snippet');
    expect(url.searchParams.get('key')).toBe('test-key');
    expect(calls[0].method).toBe('GET');
  });

  it('propagates provider failures with status and body', async () => {
    const { fetchImpl } = mockFetch(() => ({ status: 502, body: { message: 'upstream down' } }));
    const integrations = createIntegrations(testConfig({ OCOYA_API_KEY: 'test-key' }), fetchImpl);

    const failure = integrations.publishSocial({ channel: 'x', text: 'y' });
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toMatchObject({ provider: 'ocoya', statusCode: 502, body: { message: 'upstream down' } });
  });

  it('keeps non-JSON provider bodies as text', async () => {
    const { fetchImpl } = mockFetch(() => ({ status: 500, body: 'boom' }));
    const integrations = createIntegrations(
      testConfig({ VIDEOAI_API_KEY: 'test-key', VIDEOAI_ENDPOINT: 'https://video.test/generate' }),
      fetchImpl
    );
    await expect(integrations.generateVideo({ prompt: 'x' })).rejects.toMatchObject({ statusCode: 500, body: 'boom' });
  });
});
