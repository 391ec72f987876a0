import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { applyTemplate, escapeHtml, renderMovieItem, renderSite, writeSite } from '../report/site.js';
import { StorageReadError } from '../shared/errors.js';
import { makeTmpDir, removeDir } from './helpers.js';

const bundledTemplate = fileURLToPath(new URL('../../templates/index_template.html', import.meta.url));

describe('site', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('should escape markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
  });

  it('should replace every occurrence of a placeholder', () => {
    expect(applyTemplate('{{a}}-{{b}}-{{a}}', { a: '1', b: '2' })).toBe('1-2-1');
  });

  it('should render a movie without a poster', () => {
    expect(renderMovieItem({ title: 'Heat', year: 1995, rating: 8.3, poster: '' })).toBe(
      [
        '    <li>',
        '      <div class="movie">',
        '        <div class="movie-title">Heat</div>',
        '        <div class="movie-year">1995</div>',
        '      </div>',
        '    </li>',
      ].join('\n')
    );
  });

  it('should render a poster with an escaped title', () => {
    const item = renderMovieItem({ title: 'Fast & Furious', year: 2009, rating: 6.5, poster: 'https://img.test/f.jpg' });
    expect(item.split('\n')[2]).toBe(
      '        <img class="movie-poster" src="https://img.test/f.jpg" alt="Fast &amp; Furious poster"/>'
    );
  });

  it('should fill the title and grid', () => {
    const html = renderSite(
      [
        { title: 'Heat', year: 1995, rating: 8.3, poster: '' },
        { title: 'Alien', year: 1979, rating: 8.5, poster: '' },
      ],
      '<title>{{title}}</title>\n<ol>\n{{movieGrid}}\n</ol>',
      { title: 'Mine & Yours' }
    );
    expect(html.split('\n')[0]).toBe('<title>Mine &amp; Yours</title>');
    expect(html).toContain('<div class="movie-title">Heat</div>');
    expect(html.indexOf('Heat')).toBeLessThan(html.indexOf('Alien'));
  });

  it('should fill the bundled template completely', () => {
    const out = path.join(dir, 'site', 'index.html');
    expect(writeSite([{ title: 'Heat', year: 1995, rating: 8.3, poster: '' }], bundledTemplate, out, 'My Movie App')).toBe(out);
    const html = fs.readFileSync(out, 'utf-8');
    expect(html).toContain('<title>My Movie App</title>');
    expect(html).toContain('<h1>My Movie App</h1>');
    expect(html).toContain('<div class="movie-year">1995</div>');
    expect(html).not.toContain('{{');
  });

  it('should fail on a missing template', () => {
    expect(() => writeSite([], path.join(dir, 'none.html'), path.join(dir, 'index.html'), 'x')).toThrow(StorageReadError);
  });
});
