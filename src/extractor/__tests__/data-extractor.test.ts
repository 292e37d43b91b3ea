import { describe, it, expect } from 'vitest';

import { extractDataElements } from '../data-extractor.js';
import { extractTextElements } from '../text-extractor.js';

describe('extractDataElements', () => {
  it('should re-serialise JSON into the preview', () => {
    const elements = extractDataElements('{"a":1,"b":[1,2]}', 'json');

    expect(elements).toEqual([
      {
        kind: 'Data',
        name: 'root',
        docstring: 'JSON data',
        sourceText: '{\n  "a": 1,\n  "b": [\n    1,\n    2\n  ]\n}',
        startLine: 1,
        endLine: 1,
        language: 'json',
      },
    ]);
  });

  it('should keep the digits of integers beyond double precision', () => {
    const [root] = extractDataElements('{"id": 12345678901234567890, "ratio": 0.10}', 'json');

    expect(root?.sourceText).toBe('{\n  "id": 12345678901234567890,\n  "ratio": 0.10\n}');
  });

  it('should truncate a long normalised preview', () => {
    const content = JSON.stringify(Array.from({ length: 400 }, (_, i) => i));

    const [root] = extractDataElements(content, 'json');

    expect(root?.sourceText).toHaveLength(1003);
    expect(root?.sourceText.endsWith('...')).toBe(true);
  });

  it('should contain a JSON parse failure', () => {
    const [element] = extractDataElements('{"a":', 'json');

    expect(element?.kind).toBe('Data');
    expect(element?.name).toBe('content');
    expect(element?.docstring.startsWith('Error parsing json data: ')).toBe(true);
    expect(element?.errorMessage).toBeTruthy();
    expect(element?.sourceText).toBe('{"a":');
  });

  it('should normalise YAML and accept the yml label', () => {
    const [element] = extractDataElements('name:   demo\nitems:\n  - one\n  - two\n', 'yml');

    expect(element?.docstring).toBe('YAML data');
    expect(element?.language).toBe('yaml');
    expect(element?.sourceText).toBe('name: demo\nitems:\n  - one\n  - two\n');
    expect(element?.endLine).toBe(4);
  });

  it('should normalise TOML', () => {
    const [element] = extractDataElements('title="demo"', 'toml');

    expect(element?.name).toBe('root');
    expect(element?.docstring).toBe('TOML data');
    expect(element?.sourceText).toContain('title = "demo"');
  });

  it('should keep XML and CSV verbatim under their sentinel names', () => {
    const [xml] = extractDataElements('<a><b/></a>', 'xml');
    const [csv] = extractDataElements('id,name\n1,one', 'csv');

    expect(xml?.name).toBe('xml_content');
    expect(xml?.docstring).toBe('XML data');
    expect(xml?.sourceText).toBe('<a><b/></a>');
    expect(csv?.name).toBe('csv_content');
    expect(csv?.endLine).toBe(2);
  });

  it('should treat ini files as plain content', () => {
    const [element] = extractDataElements('[core]\nkey=value', 'ini');

    expect(element?.kind).toBe('Content');
    expect(element?.docstring).toBe('Ini content');
  });
});

describe('extractTextElements', () => {
  it('should wrap the whole input in one Content element', () => {
    expect(extractTextElements('hello\nworld', 'text')).toEqual([
      {
        kind: 'Content',
        name: 'content',
        docstring: 'Text content',
        sourceText: 'hello\nworld',
        startLine: 1,
        endLine: 2,
        language: 'text',
      },
    ]);
  });

  it('should not count the line after a trailing newline', () => {
    const [single] = extractTextElements('a\nb\n', 'text');
    const [blankTail] = extractTextElements('a\nb\n\n', 'text');

    expect(single?.endLine).toBe(2);
    expect(blankTail?.endLine).toBe(3);
  });

  it('should capitalise the format label', () => {
    const [element] = extractTextElements('<p>x</p>', 'HTML');

    expect(element?.docstring).toBe('Html content');
  });
});
