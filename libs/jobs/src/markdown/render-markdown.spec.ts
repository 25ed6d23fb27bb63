import { renderMarkdown } from './render-markdown';

describe('renderMarkdown', () => {
  it('renders plain text pages separated by rules', () => {
    const { markdown, tables } = renderMarkdown([
      { text: 'First page', tables: [] },
      { text: '  Second page \n', tables: [] },
    ]);

    expect(markdown).toBe('First page\n\n---\n\nSecond page\n');
    expect(tables).toEqual([]);
  });

  it('renders tables under numbered headings and flattens them', () => {
    const { markdown, tables } = renderMarkdown([
      { text: 'Summary', tables: [] },
      {
        text: '',
        tables: [{ headers: ['Item', 'Qty'], rows: [['Bolts', '12']] }],
      },
    ]);

    expect(markdown).toBe(
      [
        'Summary',
        '',
        '---',
        '',
        '## Table 1 (Page 2)',
        '',
        '|Item|Qty|',
        '|---|---|',
        '|Bolts|12|',
        '',
      ].join('\n'),
    );
    expect(tables).toEqual([{ page: 2, headers: ['Item', 'Qty'], rows: [['Bolts', '12']] }]);
  });

  it('pads short rows, cuts long ones and escapes cell content', () => {
    const { markdown, tables } = renderMarkdown([
      {
        text: '',
        tables: [
          {
            headers: ['A', 'B'],
            rows: [['only'], ['x|y', 'two\nlines', 'extra']],
          },
        ],
      },
    ]);

    expect(markdown).toBe(
      '## Table 1 (Page 1)\n\n|A|B|\n|---|---|\n|only||\n|x\\|y|two lines|\n',
    );
    expect(tables[0].rows).toEqual([
      ['only', ''],
      ['x|y', 'two lines'],
    ]);
  });

  it('skips empty pages and header-less tables', () => {
    const { markdown } = renderMarkdown([
      { text: '   ', tables: [{ headers: [], rows: [['orphan']] }] },
      { text: 'Body', tables: [] },
    ]);

    expect(markdown).toBe('Body\n');
  });

  it('renders nothing for an empty extraction', () => {
    expect(renderMarkdown([]).markdown).toBe('');
    expect(renderMarkdown([{ text: '', tables: [] }]).markdown).toBe('');
  });
});
