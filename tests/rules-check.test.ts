import { describe, it, expect } from 'vitest';
import { checkTree } from '../src/engine';
import { parseSource, isParseFailure } from '../src/parser';

function results(code: string): string[] {
  const parsed = parseSource(code);
  if (isParseFailure(parsed)) {
    throw new Error(parsed.parseError.message);
  }
  return checkTree(parsed.tree).map((f) => `${f.line}:${f.column} ${f.ruleId}`);
}

describe('PMC001 inplace=True', () => {
  it('does not flag a call without inplace', () => {
    expect(results("df.set_index('col')")).toEqual([]);
  });

  it('flags inplace=True', () => {
    expect(results("df.set_index('col', inplace=True)")).toEqual(['1:0 PMC001']);
  });

  it('does not flag inplace=False or other boolean keywords', () => {
    expect(results('df.dropna(inplace=False)\ndf.reset_index(drop=True)')).toEqual([]);
  });

  it('flags calls inside function bodies', () => {
    expect(results('def clean(df):\n    df.dropna(inplace=True)\n')).toEqual(['2:4 PMC001']);
  });
});

describe('PMC002 reassignment using call', () => {
  it('does not flag calls that are not assigned back', () => {
    expect(results('df.sum()\npd.get_dummies(df, col)')).toEqual([]);
  });

  it('flags a call on the target name', () => {
    expect(results('df = df.sum()')).toEqual(['1:0 PMC002']);
  });

  it('flags longer chains rooted at the target name', () => {
    expect(results("df = df.sum().sum()\ndf = df['a'].abs()")).toEqual(['1:0 PMC002', '2:0 PMC002']);
  });

  it('does not flag calls on another receiver or bare function calls', () => {
    expect(results('df = pd.get_dummies(df, col)\ndf = fct(df)\nout = df.sum()')).toEqual([]);
  });

  it('flags annotated reassignment', () => {
    expect(results('df: pd.DataFrame = df.dropna()')).toEqual(['1:0 PMC002']);
  });
});

describe('PMC003 reassignment using subscript', () => {
  it('does not flag plain selections', () => {
    expect(results('df[col]\ndf.loc[col]\ndf.sum().loc[col]')).toEqual([]);
  });

  it('flags subscripts rooted at the target name', () => {
    const code = 'df = df[col]\ndf = df.loc[col]\ndf = df.sum()[col]\ndf = df.sum().loc[col]';
    expect(results(code)).toEqual(['1:0 PMC003', '2:0 PMC003', '3:0 PMC003', '4:0 PMC003']);
  });

  it('flags an inline mask selection as PMC003 only', () => {
    expect(results('df = df[df.a > 0]')).toEqual(['1:0 PMC003']);
  });
});

describe('PMC004 assignment using subscript', () => {
  it('does not flag assign()', () => {
    expect(results('df.assign(col=0)')).toEqual([]);
  });

  it('flags subscript targets', () => {
    const code = 'df[col] = 0\ndf.loc[col] = 0\ndf.iloc[col] = 0\ndf.at[col] = 0\ndf.iat[col] = 0';
    expect(results(code)).toEqual(['1:0 PMC004', '2:0 PMC004', '3:0 PMC004', '4:0 PMC004', '5:0 PMC004']);
  });

  it('flags augmented subscript assignment', () => {
    expect(results("df['a'] += 1")).toEqual(['1:0 PMC004']);
  });

  it('flags a new column', () => {
    expect(results("df['new_col'] = 5")).toEqual(['1:0 PMC004']);
  });
});

describe('PMC005 assignment using attribute', () => {
  it('flags attribute targets', () => {
    expect(results('df.col = 0')).toEqual(['1:0 PMC005']);
  });

  it('matches on shape alone', () => {
    expect(results('class A:\n    def f(self):\n        self.value = 1\n')).toEqual(['3:8 PMC005']);
  });
});

describe('PMC006 assignment of index or columns', () => {
  it('does not flag rename()', () => {
    const code = "df.rename({1:'idx1', 2:'idx2'})\ndf.rename({1:'col1', 2:'col2'}, axis=1)";
    expect(results(code)).toEqual([]);
  });

  it('flags index and columns assignment instead of PMC005', () => {
    const code = "df.index = ['idx1', 'idx2']\ndf.columns = ['col1', 'col2']";
    expect(results(code)).toEqual(['1:0 PMC006', '2:0 PMC006']);
  });
});

describe('PMC007 selection reusing a mask variable', () => {
  it('does not flag lambda selections', () => {
    expect(results('df.loc[lambda df_: df_.isna().any(axis=1)]')).toEqual([]);
  });

  it('does not flag inline masks', () => {
    expect(results('df[df.isna().any(axis=1)]\ndf.loc[df.a > 0]')).toEqual([]);
  });

  it('flags a comparison mask reused in a selection', () => {
    expect(results('mask = df.a > 0\ndf[mask]')).toEqual(['2:0 PMC007']);
  });

  it('flags a mask built from a boolean method', () => {
    expect(results('mask = df.isna().any(axis=1)\ndf.loc[mask]')).toEqual(['2:0 PMC007']);
  });

  it('flags combined masks used with a column selector', () => {
    expect(results("m = (df.a > 0) & (df.b < 3)\ndf.loc[m, 'c']")).toEqual(['2:0 PMC007']);
  });

  it('follows aliases and chained assignment', () => {
    expect(results('a = b = df.x > 0\nc = a\ndf[b]\ndf[c]')).toEqual(['3:0 PMC007', '4:0 PMC007']);
  });

  it('does not flag names that are not masks', () => {
    expect(results("cols = ['a', 'b']\ndf[cols]\ndf[mask]")).toEqual([]);
  });

  it('reports both rules on a reassignment through a mask', () => {
    expect(results('mask = df.a > 0\ndf = df[mask]')).toEqual(['2:0 PMC003', '2:5 PMC007']);
  });

  it('tracks masks per function', () => {
    expect(results('def f(df):\n    mask = df.a > 0\n    return df[mask]\n')).toEqual(['3:11 PMC007']);
    expect(results('def f(df):\n    mask = df.a > 0\n\ndef g(df):\n    return df[mask]\n')).toEqual([]);
    expect(results('mask = df.a > 0\ndef f(df):\n    return df[mask]\n')).toEqual([]);
  });

  it('looks inside f-string interpolations', () => {
    expect(results("m = df.a > 0\nprint(f'{df[m]}')")).toEqual(['2:9 PMC007']);
  });
});

describe('all rules together', () => {
  it('reports findings in source order', () => {
    const code = [
      'import pandas as pd',
      '',
      "df = pd.read_csv('data.csv')",
      'df.dropna(inplace=True)',
      'df = df.rename(columns=str.lower)',
      "df.columns = ['a', 'b']",
      "df['c'] = df.a * 2",
      'mask = df.c > 10',
      'print(df[mask])',
    ].join('\n');

    expect(results(code)).toEqual([
      '4:0 PMC001',
      '5:0 PMC002',
      '6:0 PMC006',
      '7:0 PMC004',
      '9:6 PMC007',
    ]);
  });

  it('skips comments', () => {
    expect(results('df = df.sum()  # total\n# df = df.sum()\n')).toEqual(['1:0 PMC002']);
  });
});
