/**
 * Local Inference Tests
 */

import { inferLocal, findListItems } from '../local-inference';
import { markdownDoc } from '../../../../__tests__/helpers/fixtures';

describe('findListItems', () => {
  it('should read <li> elements and bulleted lines', () => {
    const text = '<ul><li>First <b>item</b></li><li>No</li></ul>\n- Dash item\n* Star item\n• Dot item\n2. Numbered item';

    expect(findListItems(text)).toEqual(['First item', 'Dash item', 'Star item', 'Dot item', 'Numbered item']);
  });
});

describe('inferLocal', () => {
  it('should turn sections under a single title into modules', () => {
    expect(inferLocal(markdownDoc, 10)).toEqual([
      {
        name: 'Installation',
        description: 'Install the package with your package manager. It works on every platform.',
        submodules: { Requirements: 'A recent runtime is required.' },
      },
      {
        name: 'Configuration',
        description: 'Configuration lives in one file. Every option has a default.',
        submodules: { 'Output directory': '', 'Cache location': '' },
      },
      {
        name: 'Deployment',
        description: 'Deploy the built files to any static host. Nothing else is needed.',
        submodules: {},
      },
    ]);
  });

  it('should keep at most maxModules modules', () => {
    expect(inferLocal(markdownDoc, 2).map((module) => module.name)).toEqual(['Installation', 'Configuration']);
  });

  it('should read HTML headings and list items', () => {
    const html = [
      '<h1>Guide</h1>',
      '<h2>Alpha</h2><p>Alpha does the first thing well.</p>',
      '<h2>Beta</h2><ul><li>One item</li><li>Two item</li></ul>',
      '<h2>Gamma</h2><p>Gamma text here.</p><h3>Gamma sub</h3><p>Sub text.</p>',
      '<h2>Delta</h2>',
    ].join('');

    const modules = inferLocal(html, 10);

    expect(modules.map((module) => module.name)).toEqual(['Alpha', 'Beta', 'Gamma', 'Delta']);
    expect(modules[0].description).toBe('Alpha does the first thing well.');
    expect(modules[1].submodules).toEqual({ 'One item': '', 'Two item': '' });
    expect(modules[2].submodules).toEqual({ 'Gamma sub': 'Sub text.' });
    expect(modules[3]).toEqual({ name: 'Delta', description: '', submodules: {} });
  });

  it('should keep list items named like object internals', () => {
    const html = '<h2>Setup</h2><ul><li>__proto__</li><li>constructor</li></ul><h2>Usage</h2><p>Usage notes.</p>';

    const [setup] = inferLocal(html, 10);

    expect(Object.keys(setup.submodules)).toEqual(['__proto__', 'constructor']);
    expect(Object.getPrototypeOf(setup.submodules)).toBe(Object.prototype);
  });

  it('should report a repeated heading once', () => {
    const text = '## Setup\nFirst setup notes.\n## Setup\nSecond setup notes.\n## Usage\nUsage notes.';

    expect(inferLocal(text, 10).map((module) => module.name)).toEqual(['Setup', 'Usage']);
  });

  it('should nest every deeper heading under a custom top tier', () => {
    const [toolkit, ...rest] = inferLocal(markdownDoc, 10, { tierPolicy: { selectTopLevel: () => 1 } });

    expect(rest).toEqual([]);
    expect(toolkit.name).toBe('Toolkit');
    expect(Object.keys(toolkit.submodules)).toEqual([
      'Installation',
      'Requirements',
      'Output directory',
      'Cache location',
      'Deployment',
    ]);
    expect(toolkit.submodules.Installation).toBe(
      'Install the package with your package manager. It works on every platform.'
    );
  });

  it('should split headingless text on blank lines', () => {
    const text = 'First block line\nsecond line\nthird line\nfourth\n\nSecond block\n\n\nThird block only';

    expect(inferLocal(text, 2)).toEqual([
      { name: 'First block line', description: 'second line third line', submodules: {} },
      { name: 'Second block', description: 'Second block', submodules: {} },
    ]);
  });

  it('should return nothing for blank text or a zero limit', () => {
    expect(inferLocal('   \n ', 5)).toEqual([]);
    expect(inferLocal(markdownDoc, 0)).toEqual([]);
  });

  it('should be deterministic', () => {
    expect(inferLocal(markdownDoc, 10)).toEqual(inferLocal(markdownDoc, 10));
  });
});
