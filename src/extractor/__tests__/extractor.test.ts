/**
 * Dispatcher Tests
 *
 * Routing from language labels and paths to the extraction strategies.
 */

import { describe, it, expect } from 'vitest';

import { extractElements, extractFromPath, withSourceFile } from '../extractor.js';

describe('extractElements', () => {
  it('should use the grammar for python', () => {
    const elements = extractElements('async def load():\n    return 1\n', 'Python');

    expect(elements).toHaveLength(1);
    expect(elements[0]?.kind).toBe('AsyncFunction');
  });

  it('should use the line scanner for other code languages', () => {
    const elements = extractElements('func Add(a, b int) int {\n  return a+b\n}', 'go');

    expect(elements[0]?.kind).toBe('Function');
    expect(elements[0]?.name).toBe('Add');
  });

  it('should route data labels to the data extractor', () => {
    const [element] = extractElements('a: 1\n', 'yml');

    expect(element?.kind).toBe('Data');
    expect(element?.docstring).toBe('YAML data');
  });

  it('should route markdown to sections', () => {
    const [section] = extractElements('# Title\nbody', 'markdown');

    expect(section?.kind).toBe('Section');
  });

  it('should treat unlisted labels as plain content', () => {
    const [element] = extractElements('whatever', 'cobol');

    expect(element?.kind).toBe('Content');
    expect(element?.docstring).toBe('Cobol content');
  });
});

describe('extractFromPath', () => {
  it('should classify by extension before dispatching', () => {
    expect(extractFromPath('app.py', 'class A:\n    pass\n')[0]?.kind).toBe('Class');
    expect(extractFromPath('main.rs', 'fn main() {\n}')[0]?.kind).toBe('Function');
    expect(extractFromPath('data.json', '[1]')[0]?.name).toBe('root');
    expect(extractFromPath('README.md', '# Intro\ntext')[0]?.name).toBe('Intro');
    expect(extractFromPath('site.css', 'a {}')[0]?.docstring).toBe('Css content');
  });

  it('should label unknown files by their extension', () => {
    const [element] = extractFromPath('notes.xyz', 'anything');

    expect(element?.kind).toBe('Content');
    expect(element?.language).toBe('xyz');
    expect(element?.docstring).toBe('Xyz content');
  });

  it('should label extension-less files as text', () => {
    const [element] = extractFromPath('Makefile', 'all:\n\tbuild');

    expect(element?.language).toBe('text');
    expect(element?.docstring).toBe('Text content');
  });

  it('should never return an empty list', () => {
    const paths = ['a.py', 'a.go', 'a.json', 'a.yaml', 'a.xml', 'a.md', 'a.txt', 'a.bin', 'a'];

    for (const path of paths) {
      expect(extractFromPath(path, '').length).toBeGreaterThan(0);
    }
  });
});

describe('withSourceFile', () => {
  it('should annotate copies and leave the originals untouched', () => {
    const original = extractFromPath('a.go', 'func A() {\n}');

    const annotated = withSourceFile(original, 'pkg/a.go');

    expect(annotated[0]?.sourceFile).toBe('pkg/a.go');
    expect(annotated[0]?.name).toBe('A');
    expect(original[0]?.sourceFile).toBeUndefined();
    expect(Object.isFrozen(annotated[0])).toBe(true);
  });
});
