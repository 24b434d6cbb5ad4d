import { describe, expect, it } from 'vitest';
import { PipelineError, type DocumentNode } from '@linewright/contracts';
import { parseDocument } from './parse.js';

const body = (root: DocumentNode): DocumentNode => {
  const found = root.children.find((child) => child.tag === 'body');
  if (!found) throw new Error('no body');
  return found;
};

describe('parseDocument', () => {
  it('roots the tree at <html> with head and body', () => {
    const root = parseDocument('<p>Hi</p>');
    expect(root.tag).toBe('html');
    expect(root.children.map((child) => child.tag)).toEqual(['head', 'body']);
  });

  it('keeps attributes in source order', () => {
    const root = parseDocument('<h1 class="title-site" data-mode="dynamic" id="top">Welcome</h1>');
    const h1 = body(root).children[0];
    expect(h1.tag).toBe('h1');
    expect(Object.entries(h1.attributes)).toEqual([
      ['class', 'title-site'],
      ['data-mode', 'dynamic'],
      ['id', 'top'],
    ]);
  });

  it('exposes text under the content attribute of a text leaf', () => {
    const root = parseDocument('<h1>Welcome to my page</h1>');
    const text = body(root).children[0].children[0];
    expect(text).toEqual({ tag: 'text', attributes: { content: 'Welcome to my page' }, children: [] });
  });

  it('lowercases tag names', () => {
    const root = parseDocument('<P>x</P><BR>');
    expect(body(root).children.map((child) => child.tag)).toEqual(['p', 'br']);
  });

  it('keeps siblings in order', () => {
    const root = parseDocument('<h1>Welcome</h1><h2>Subtitle content</h2>');
    expect(body(root).children.map((child) => child.tag)).toEqual(['h1', 'h2']);
  });

  it('drops comments, whitespace-only text and ignored elements', () => {
    const root = parseDocument('<p>a</p>\n  <!-- note --><script>var x = 1;</script><style>p{}</style><p>b</p>');
    expect(body(root).children.map((child) => child.tag)).toEqual(['p', 'p']);
  });

  it('keeps whitespace text and custom ignore lists on request', () => {
    const root = parseDocument('<p>a</p> <aside>z</aside><script>s</script>', {
      keepWhitespaceText: true,
      ignoredTags: ['ASIDE'],
    });
    expect(body(root).children.map((child) => child.tag)).toEqual(['p', 'text', 'script']);
  });

  it('recovers from malformed markup the way an HTML parser does', () => {
    const root = parseDocument('<p><b>bold <i>both</p>tail');
    const p = body(root).children[0];
    expect(p.tag).toBe('p');
    expect(p.children[0].tag).toBe('b');
  });

  it('rejects non-string input with PARSE_ERROR', () => {
    try {
      parseDocument(JSON.parse('42'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PipelineError);
      expect(error).toMatchObject({ code: 'PARSE_ERROR' });
    }
  });
});
