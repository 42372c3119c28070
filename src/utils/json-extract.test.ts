import { z } from 'zod';
import { parseJsonReply } from './json-extract.js';

const schema = z.object({ filename: z.string(), summary: z.string() });

describe('parseJsonReply', () => {
  it('accepts a bare JSON object', () => {
    expect(parseJsonReply('{"filename":"a.md","summary":"s"}', schema)).toEqual({
      ok: true,
      value: { filename: 'a.md', summary: 's' },
    });
  });

  it('reads a fenced block', () => {
    const text = 'Here you go:\n```json\n{"filename":"b.md","summary":"t"}\n```';
    expect(parseJsonReply(text, schema)).toEqual({ ok: true, value: { filename: 'b.md', summary: 't' } });
  });

  it('finds an object embedded in prose', () => {
    const text = 'Sure! {"filename":"c.md","summary":"u"} Hope that helps.';
    expect(parseJsonReply(text, schema)).toEqual({ ok: true, value: { filename: 'c.md', summary: 'u' } });
  });

  it('reports a schema mismatch', () => {
    expect(parseJsonReply('{"filename":"d.md"}', schema)).toEqual({ ok: false, error: 'summary: Required' });
  });

  it('reports empty output', () => {
    expect(parseJsonReply('   ', schema)).toEqual({ ok: false, error: 'Empty output' });
  });
});
