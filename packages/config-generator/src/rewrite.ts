import {ConfigGenerationError} from './errors';

export type NginxRewrite = {
  regex: string;
  replacement: string;
};

const UNSAFE_CHARACTERS = /["\n\r;{}]/u;

// Trailing part of a request path: last segment, optional fragment and query.
const FINAL_SEGMENT = '([^/]*(?:#[^?/]*)?(?:\\?.*)?)$';
const INTERMEDIATE_SEGMENTS = '([^?#]*/)?';

export const countCaptureGroups = (pattern: string): number => {
  try {
    const groups = new RegExp(`(?:${pattern})|`, 'u').exec('');
    return (groups?.length ?? 1) - 1;
  } catch {
    throw new ConfigGenerationError('rewrite_rule_invalid', `Rewrite pattern does not compile: ${pattern}`);
  }
};

/**
 * Turns a path-part rewrite rule into a `rewrite` directive matching the whole
 * request path. Unanchored patterns capture the leading path, and everything
 * after the matched part is captured and appended to the replacement.
 */
export const transformRewriteRule = (requestPattern: string, mappedPath: string): NginxRewrite => {
  if (requestPattern.length === 0 || UNSAFE_CHARACTERS.test(requestPattern) || UNSAFE_CHARACTERS.test(mappedPath)) {
    throw new ConfigGenerationError('rewrite_rule_invalid', 'Rewrite rule contains unsupported characters');
  }

  let groups = countCaptureGroups(requestPattern);
  let regex = requestPattern;
  let replacement = mappedPath;

  if (!regex.startsWith('^')) {
    regex = `^(.*)${regex}`;
    replacement = `\${1}${replacement}`;
    groups += 1;
  }

  if (regex.endsWith('$')) {
    regex = regex.slice(0, -1);
  } else {
    regex = `${regex}${INTERMEDIATE_SEGMENTS}`;
    replacement = `${replacement}$${groups + 1}`;
    groups += 1;
  }

  return {
    regex: `${regex}${FINAL_SEGMENT}`,
    replacement: `${replacement}$${groups + 1}`
  };
};
