import { redactMeta } from '.';

describe('redactMeta', () => {
  it('masks credential-bearing keys at any depth', () => {
    expect(
      redactMeta({
        repositoryId: 1,
        secret: 'test-secret',
        headers: { Authorization: 'Bearer test-token', accept: 'application/json' },
        credentials: [{ token: 'test-token', source: 'static' }],
      })
    ).toEqual({
      repositoryId: 1,
      secret: '[redacted]',
      headers: { Authorization: '[redacted]', accept: 'application/json' },
      credentials: [{ token: '[redacted]', source: 'static' }],
    });
  });

  it('reduces errors to name and message', () => {
    expect(redactMeta({ error: new TypeError('bad input') })).toEqual({ error: { name: 'TypeError', message: 'bad input' } });
  });
});
