import { ParseError } from '../lib/errors.js';

export type NodeRoleSet = string[];
export type RoleList = NodeRoleSet[];

type ParserState =
  | { kind: 'outside' }
  | { kind: 'inside'; node: NodeRoleSet };

/**
 * Parses the bracketed role notation used by `--roles`, e.g.
 * `[admin, mon, mgr], [storage, mon, mgr, mds]`.
 *
 * The text is split on commas and the fragments are fed through a two-state
 * automaton that tracks whether a `[` group is currently open. Only one
 * level of brackets exists. An empty string yields an empty list.
 */
export function parseRoles(text: string): RoleList {
  if (text.trim() === '') {
    return [];
  }

  const roles: RoleList = [];
  let state: ParserState = { kind: 'outside' };

  for (const raw of text.split(',')) {
    let fragment = raw.trim();

    if (state.kind === 'outside') {
      if (!fragment.startsWith('[')) {
        throw new ParseError(`Role '${fragment}' is not inside a [...] group in '${text}'`);
      }
      fragment = fragment.slice(1);
      state = { kind: 'inside', node: [] };
    } else if (fragment.startsWith('[')) {
      throw new ParseError(`Group opened before the previous one was closed in '${text}'`);
    }

    const closes = fragment.endsWith(']');
    if (closes) {
      fragment = fragment.slice(0, -1);
    }

    state.node.push(checkToken(fragment.trim(), text));

    if (closes) {
      roles.push(state.node);
      state = { kind: 'outside' };
    }
  }

  if (state.kind === 'inside') {
    throw new ParseError(`Unterminated role group [${state.node.join(', ')} in '${text}'`);
  }

  return roles;
}

function checkToken(token: string, text: string): string {
  if (token === '') {
    throw new ParseError(`Empty role in '${text}'`);
  }
  if (token.includes('[') || token.includes(']')) {
    throw new ParseError(`Unexpected bracket in role '${token}' in '${text}'`);
  }
  return token;
}

export function renderRoles(roles: readonly (readonly string[])[]): string {
  return roles.map(node => `[${node.join(', ')}]`).join(', ');
}
