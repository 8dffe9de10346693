import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { redactContext } from '../redaction.js';

const OPAQUE = `abcd${'x'.repeat(24)}wxyz`;

void describe('redactContext', () => {
  void it('replaces values under sensitive keys at any depth', () => {
    assert.deepEqual(
      redactContext(
        { client_secret: 'test-secret', headers: { Authentication: 'bearer test-secret' }, sku: 'A' },
        'development'
      ),
      { client_secret: '[REDACTED_TOKEN]', headers: { Authentication: '[REDACTED_TOKEN]' }, sku: 'A' }
    );
  });

  void it('masks emails and opaque credentials outside test mode', () => {
    assert.deepEqual(
      redactContext({ contact: 'ops@example.com', header: `Bearer ${OPAQUE}` }, 'production'),
      { contact: 'o***@***.com', header: 'abcd***wxyz' }
    );
  });

  void it('leaves plain strings alone in test mode', () => {
    assert.deepEqual(redactContext({ contact: 'ops@example.com' }, 'test'), {
      contact: 'ops@example.com',
    });
  });

  void it('serializes errors and trims stacks in production', () => {
    const error = new Error('HTTP 502', { cause: new Error('socket hang up') });
    error.stack = 'Error: HTTP 502\n    at a\n    at b\n    at c\n    at d';

    const out = redactContext({ error }, 'production');

    assert.deepEqual(out['error'], {
      name: 'Error',
      message: 'HTTP 502',
      stack: 'Error: HTTP 502\n    at a\n    at b',
      cause: {
        name: 'Error',
        message: 'socket hang up',
        stack: (error.cause instanceof Error ? error.cause.stack : undefined)
          ?.split('\n')
          .slice(0, 3)
          .join('\n'),
      },
    });
  });
});
