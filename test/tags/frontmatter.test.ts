import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  scanFrontMatter,
  parseFrontMatter,
  deriveTitle,
  extractMetadata,
} from '../../src/tags/frontmatter';
import { DocTagsError } from '../../src/shared/types';
import { catchDocTagsError, createTempDir, removeTempDir, writeTree } from '../cli/helpers/cli-test-helpers';

describe('scanFrontMatter', () => {
  it('captures the block and the H1 that follows it', () => {
    const scan = scanFrontMatter('---\ntags: [a, B]\n---\n# My Page\ntext');
    expect(scan).toEqual({ found: true, block: 'tags: [a, B]', headingTitle: 'My Page' });
  });

  it('ignores lines before the first delimiter', () => {
    const scan = scanFrontMatter('intro line\n---\ntitle: X\n---\n');
    expect(scan.found).toBe(true);
    expect(scan.block).toBe('title: X');
    expect(scan.headingTitle).toBeNull();
  });

  it('keeps blank lines inside the block', () => {
    const scan = scanFrontMatter('---\na: 1\n\nb: 2\n---\n');
    expect(scan.block).toBe('a: 1\n\nb: 2');
  });

  it('accepts delimiters surrounded by whitespace', () => {
    const scan = scanFrontMatter('  ---  \na: 1\n---\t\n');
    expect(scan.found).toBe(true);
    expect(scan.block).toBe('a: 1');
  });

  it('skips blank lines before the heading', () => {
    const scan = scanFrontMatter('---\na: 1\n---\n\n\n#   Title  \nbody');
    expect(scan.headingTitle).toBe('Title');
  });

  it('stops at the first non-blank line when it is not an H1', () => {
    const scan = scanFrontMatter('---\na: 1\n---\nparagraph\n# Later heading');
    expect(scan.headingTitle).toBeNull();
  });

  it('does not treat an H2 as a title', () => {
    const scan = scanFrontMatter('---\na: 1\n---\n## Section');
    expect(scan.headingTitle).toBeNull();
  });

  it('handles CRLF line endings', () => {
    const scan = scanFrontMatter('---\r\na: 1\r\n---\r\n# T\r\n');
    expect(scan).toEqual({ found: true, block: 'a: 1', headingTitle: 'T' });
  });

  it('reports no block when only one delimiter is present', () => {
    const scan = scanFrontMatter('---\ntags: [a]\n');
    expect(scan).toEqual({ found: false, block: '', headingTitle: null });
  });

  it('reports no block when there are no delimiters', () => {
    expect(scanFrontMatter('# Just a page\n\nSome text.').found).toBe(false);
  });
});

describe('parseFrontMatter', () => {
  it('parses a YAML mapping', () => {
    expect(parseFrontMatter('title: Hello\ntags:\n  - a\n  - b', 'x.md')).toEqual({
      title: 'Hello',
      tags: ['a', 'b'],
    });
  });

  it('keeps the last value of a repeated key', () => {
    expect(parseFrontMatter('tags: [a]\ntitle: A\ntitle: B', 'dup.md')).toEqual({ tags: ['a'], title: 'B' });
  });

  it('returns an empty mapping for a comment-only block', () => {
    expect(parseFrontMatter('# nothing here', 'x.md')).toEqual({});
  });

  it('throws E101 on invalid YAML', () => {
    const err = catchDocTagsError(() => parseFrontMatter('tags: [a, b', 'broken.md'));
    expect(err).toBeInstanceOf(DocTagsError);
    expect(err.code).toBe('E101');
    expect(err.context.file).toBe('broken.md');
  });

  it('throws E101 when the block is a list', () => {
    const err = catchDocTagsError(() => parseFrontMatter('- a\n- b', 'list.md'));
    expect(err.code).toBe('E101');
    expect(err.message).toBe('Malformed front matter in list.md: expected a mapping, got a list');
  });

  it('throws E101 when the block is a scalar', () => {
    const err = catchDocTagsError(() => parseFrontMatter('just text', 'scalar.md'));
    expect(err.message).toBe('Malformed front matter in scalar.md: expected a mapping, got string');
  });
});

describe('deriveTitle', () => {
  it('replaces dashes and capitalizes lowercase names', () => {
    expect(deriveTitle('foo-bar.md')).toBe('Foo bar');
  });

  it('replaces underscores too', () => {
    expect(deriveTitle('my_page-notes.md')).toBe('My page notes');
  });

  it('leaves mixed-case names as they are', () => {
    expect(deriveTitle('My-Page.md')).toBe('My Page');
    expect(deriveTitle('api-REST.md')).toBe('api REST');
  });

  it('uses only the base name', () => {
    expect(deriveTitle('guides/setup-guide.md')).toBe('Setup guide');
  });

  it('falls back to Untitled for an empty name', () => {
    expect(deriveTitle('.md')).toBe('Untitled');
  });
});

describe('extractMetadata', () => {
  let docsDir: string;

  beforeEach(() => {
    docsDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(docsDir);
  });

  it('extracts tags and the H1 title', () => {
    writeTree(docsDir, { 'my-page.md': '---\ntags: [a, B]\n---\n# My Page\ntext' });
    expect(extractMetadata('my-page.md', docsDir)).toEqual({
      filename: 'my-page.md',
      title: 'My Page',
      tags: ['a', 'B'],
      extra: {},
    });
  });

  it('derives the title from the file name when there is no H1', () => {
    writeTree(docsDir, { 'foo-bar.md': '---\ntags: [x]\n---\ncontent' });
    expect(extractMetadata('foo-bar.md', docsDir)?.title).toBe('Foo bar');
  });

  it('prefers the front-matter title over the heading', () => {
    writeTree(docsDir, { 'p.md': '---\ntitle: From Meta\n---\n# From Heading\n' });
    expect(extractMetadata('p.md', docsDir)?.title).toBe('From Meta');
  });

  it('stringifies a non-string front-matter title', () => {
    writeTree(docsDir, { 'p.md': '---\ntitle: 1984\n---\n' });
    expect(extractMetadata('p.md', docsDir)?.title).toBe('1984');
  });

  it('keeps the relative path as filename', () => {
    writeTree(docsDir, { 'guides/intro.md': '---\ntags: [start]\n---\n' });
    const meta = extractMetadata('guides/intro.md', docsDir);
    expect(meta?.filename).toBe('guides/intro.md');
    expect(meta?.title).toBe('Intro');
  });

  it('returns null for a page without front matter', () => {
    writeTree(docsDir, { 'plain.md': '# Plain\n\nNo metadata here.\n' });
    expect(extractMetadata('plain.md', docsDir)).toBeNull();
  });

  it('returns null for an empty block', () => {
    writeTree(docsDir, { 'empty.md': '---\n---\n# Empty\n' });
    expect(extractMetadata('empty.md', docsDir)).toBeNull();
  });

  it('returns null for a blank block', () => {
    writeTree(docsDir, { 'blank.md': '---\n\n   \n---\n' });
    expect(extractMetadata('blank.md', docsDir)).toBeNull();
  });

  it('treats a comment-only block as metadata without tags', () => {
    writeTree(docsDir, { 'c.md': '---\n# just a comment\n---\n' });
    expect(extractMetadata('c.md', docsDir)).toEqual({ filename: 'c.md', title: 'C', extra: {} });
  });

  it('keeps year and other fields apart', () => {
    writeTree(docsDir, { 'y.md': '---\ntags: [a]\nyear: 2019\nauthor: Ann\n---\n' });
    expect(extractMetadata('y.md', docsDir)).toEqual({
      filename: 'y.md',
      title: 'Y',
      tags: ['a'],
      year: 2019,
      extra: { author: 'Ann' },
    });
  });

  it('accepts a numeric string year', () => {
    writeTree(docsDir, { 'y.md': '---\nyear: "2020"\n---\n' });
    expect(extractMetadata('y.md', docsDir)?.year).toBe(2020);
  });

  it('leaves a non-numeric year in extra', () => {
    writeTree(docsDir, { 'y.md': '---\nyear: soon\n---\n' });
    const meta = extractMetadata('y.md', docsDir);
    expect(meta?.year).toBeUndefined();
    expect(meta?.extra).toEqual({ year: 'soon' });
  });

  it('stringifies scalar tags and drops nulls', () => {
    writeTree(docsDir, { 't.md': '---\ntags: [2020, true, null, x]\n---\n' });
    expect(extractMetadata('t.md', docsDir)?.tags).toEqual(['2020', 'true', 'x']);
  });

  it('ignores tags that are not a list', () => {
    writeTree(docsDir, { 't.md': '---\ntags: solo\n---\n' });
    expect(extractMetadata('t.md', docsDir)?.tags).toBeUndefined();
  });

  it('takes the last title when the key repeats', () => {
    writeTree(docsDir, { 'd.md': '---\ntitle: A\ntitle: B\n---\n' });
    expect(extractMetadata('d.md', docsDir)?.title).toBe('B');
  });

  it('keeps the source path even when front matter sets filename', () => {
    writeTree(docsDir, { 'real.md': '---\nfilename: other.md\n---\n' });
    const meta = extractMetadata('real.md', docsDir);
    expect(meta?.filename).toBe('real.md');
    expect(meta?.extra).toEqual({});
  });

  it('throws E101 for malformed front matter', () => {
    writeTree(docsDir, { 'bad.md': '---\ntags: [a, b\n---\n' });
    const err = catchDocTagsError(() => extractMetadata('bad.md', docsDir));
    expect(err).toBeInstanceOf(DocTagsError);
    expect(err.code).toBe('E101');
  });

  it('throws E102 for a missing file', () => {
    const err = catchDocTagsError(() => extractMetadata('missing.md', docsDir));
    expect(err).toBeInstanceOf(DocTagsError);
    expect(err.code).toBe('E102');
    expect(err.context.file).toBe('missing.md');
  });
});
