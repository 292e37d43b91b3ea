import { describe, it, expect } from 'vitest';

import {
  categoryForSubType,
  classify,
  listExtensions,
  supportedExtensions,
} from '../classifier.js';

describe('classify', () => {
  it('should map source files to code', () => {
    expect(classify('foo.py')).toEqual({ category: 'code', subType: 'python' });
    expect(classify('src/server/main.go')).toEqual({ category: 'code', subType: 'go' });
    expect(classify('App.tsx')).toEqual({ category: 'code', subType: 'typescript' });
    expect(classify('vector.hpp')).toEqual({ category: 'code', subType: 'cpp' });
  });

  it('should map structured formats to data', () => {
    expect(classify('config.yml')).toEqual({ category: 'data', subType: 'yaml' });
    expect(classify('setup.cfg')).toEqual({ category: 'data', subType: 'ini' });
    expect(classify('pyproject.toml')).toEqual({ category: 'data', subType: 'toml' });
  });

  it('should map prose and markup to document', () => {
    expect(classify('README.md')).toEqual({ category: 'document', subType: 'markdown' });
    expect(classify('index.htm')).toEqual({ category: 'document', subType: 'html' });
    expect(classify('notes.txt')).toEqual({ category: 'document', subType: 'text' });
  });

  it('should only consult the lower-cased final extension', () => {
    expect(classify('MAIN.PY')).toEqual({ category: 'code', subType: 'python' });
    expect(classify('archive.json.py')).toEqual({ category: 'code', subType: 'python' });
  });

  it('should report unknown extensions without the dot', () => {
    expect(classify('foo.unknownext')).toEqual({ category: 'unknown', subType: 'unknownext' });
  });

  it('should fall back to text when there is no extension', () => {
    expect(classify('foo')).toEqual({ category: 'unknown', subType: 'text' });
    expect(classify('Makefile')).toEqual({ category: 'unknown', subType: 'text' });
    expect(classify('.gitignore')).toEqual({ category: 'unknown', subType: 'text' });
  });
});

describe('categoryForSubType', () => {
  it('should resolve labels from every table', () => {
    expect(categoryForSubType('python')).toBe('code');
    expect(categoryForSubType('Rust')).toBe('code');
    expect(categoryForSubType('json')).toBe('data');
    expect(categoryForSubType('markdown')).toBe('document');
  });

  it('should return unknown for unlisted labels', () => {
    expect(categoryForSubType('cobol')).toBe('unknown');
  });
});

describe('supportedExtensions', () => {
  it('should list all 36 extensions without dots', () => {
    const extensions = supportedExtensions();

    expect(extensions).toHaveLength(36);
    expect(extensions[0]).toBe('py');
    expect(extensions).toContain('yml');
    expect(extensions).toContain('css');
  });
});

describe('listExtensions', () => {
  it('should sort entries and attach display names', () => {
    const data = listExtensions('data');

    expect(data.map((entry) => entry.extension)).toEqual([
      '.cfg',
      '.csv',
      '.ini',
      '.json',
      '.toml',
      '.xml',
      '.yaml',
      '.yml',
    ]);
    expect(data[0]).toEqual({ extension: '.cfg', name: 'Config' });
  });

  it('should cover the document table', () => {
    expect(listExtensions('document')).toHaveLength(5);
  });
});
