import { posix } from 'path';

export interface ShellContext {
  workingDirectory: string | null;
  environment: Record<string, string>;
}

export interface ContextChange {
  workingDirectory?: string;
  set: Array<[string, string]>;
  unset: string[];
}

const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;
const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const quoteShellWord = (value: string): string =>
  value !== '' && SAFE_WORD.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;

/** Quotes a path for `cd` while keeping a leading `~` expandable. */
export const shellPath = (path: string): string => {
  if (path === '~') {
    return '~';
  }
  if (path.startsWith('~/')) {
    return `~/${quoteShellWord(path.slice(2))}`;
  }
  return quoteShellWord(path);
};

const unquote = (value: string): string => {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    if ((first === '"' || first === "'") && trimmed.endsWith(first)) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
};

const stripTrailingSlash = (path: string): string =>
  path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;

/**
 * Where `cd <target>` lands when started from `current`. Returns undefined
 * when the result cannot be known locally.
 */
export const resolveDirectory = (current: string | null, target: string | undefined): string | undefined => {
  if (target === undefined || target === '' || target === '~') {
    return '~';
  }
  if (target === '-') {
    return undefined;
  }
  if (target.startsWith('/')) {
    return stripTrailingSlash(posix.normalize(target));
  }

  const homeRelative = target.startsWith('~/');
  const base = homeRelative ? '~' : current ?? '~';
  const rest = homeRelative ? target.slice(2) : target;

  if (base.startsWith('/')) {
    return stripTrailingSlash(posix.join(base, rest));
  }

  // base is ~ or below it
  const joined = stripTrailingSlash(posix.join(base, rest));
  if (joined === '~' || joined.startsWith('~/')) {
    return joined;
  }
  return undefined;
};

export const splitSegments = (command: string): string[] =>
  command
    .split(/&&|;/)
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);

/**
 * Context changes implied by a command that exited 0: `cd`, `export NAME=value`
 * and `unset NAME` segments, applied left to right.
 */
export const deriveContextChange = (command: string, context: ShellContext): ContextChange => {
  const change: ContextChange = { set: [], unset: [] };
  let directory = context.workingDirectory;

  for (const segment of splitSegments(command)) {
    const cd = /^cd(?:\s+(.+))?$/.exec(segment);
    if (cd) {
      const target = cd[1] === undefined ? undefined : unquote(cd[1]);
      const next = resolveDirectory(directory, target);
      if (next !== undefined) {
        directory = next;
        change.workingDirectory = next;
      }
      continue;
    }

    const exported = /^export\s+([A-Za-z_][A-Za-z0-9_]*)=(.*)$/.exec(segment);
    if (exported) {
      const [, name = '', value = ''] = exported;
      change.set.push([name, unquote(value)]);
      change.unset = change.unset.filter(unset => unset !== name);
      continue;
    }

    const unset = /^unset\s+(.+)$/.exec(segment);
    if (unset) {
      for (const name of (unset[1] ?? '').split(/\s+/)) {
        if (ENV_NAME.test(name)) {
          change.unset.push(name);
          change.set = change.set.filter(([set]) => set !== name);
        }
      }
    }
  }

  return change;
};

/** `export A='1' B='2'; cd <dir> && ` or the empty string when there is no context. */
export const contextPrefix = (context: ShellContext): string => {
  const assignments = Object.entries(context.environment)
    .filter(([name]) => ENV_NAME.test(name))
    .map(([name, value]) => `${name}=${quoteShellWord(value)}`);

  let prefix = assignments.length > 0 ? `export ${assignments.join(' ')}; ` : '';
  if (context.workingDirectory) {
    prefix += `cd ${shellPath(context.workingDirectory)} && `;
  }
  return prefix;
};
