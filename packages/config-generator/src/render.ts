import {ConfigGenerationError} from './errors';

const INDENT = '  ';
const UNSAFE_BARE_VALUE = /[\s"';{}#]/u;
const UNSAFE_QUOTED_VALUE = /["\n\r]/u;

export type Line = {depth: number; text: string};

export const bare = (label: string, value: string) => {
  if (value.length === 0 || UNSAFE_BARE_VALUE.test(value)) {
    throw new ConfigGenerationError('unsafe_value', `${label} cannot be written as a configuration value: ${value}`);
  }
  return value;
};

export const quoted = (label: string, value: string) => {
  if (UNSAFE_QUOTED_VALUE.test(value)) {
    throw new ConfigGenerationError('unsafe_value', `${label} cannot be written as a quoted value: ${value}`);
  }
  return `"${value}"`;
};

export const directive = (depth: number, text: string): Line => ({depth, text: `${text};`});

export const block = (depth: number, header: string, body: Line[]): Line[] => [
  {depth, text: `${header} {`},
  ...body,
  {depth, text: '}'}
];

export const blank = (): Line => ({depth: 0, text: ''});

export const renderLines = (lines: readonly Line[]) =>
  `${lines.map(line => (line.text.length === 0 ? '' : `${INDENT.repeat(line.depth)}${line.text}`)).join('\n')}\n`;
