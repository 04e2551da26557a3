import path from 'node:path';

import { UNKNOWN_NAME } from './defaults.js';
import { toPosixPath } from './pathUtils.js';
import type { FileLocation } from './types.js';

const QUALIFIED_MEMBER = /^[A-Z][A-Za-z0-9.]*\.[A-Za-z0-9_]+\/?\d*$/u;
const NAME_WITH_ARITY = /^([A-Za-z0-9_]+)\/(\d+)$/u;
const BARE_IDENTIFIER = /^[A-Za-z0-9_]+$/u;
const DOTTED_MODULE = /^[A-Z][A-Za-z0-9.]*$/u;
const TRAILING_ARITY = /\/\d+$/u;

export type SymbolNameOptions = {
  showArity: boolean;
  showModulePath: boolean;
};

// user_controller.ex -> UserController
export function inferModuleName(filePath: string | null | undefined): string {
  if (!filePath) return UNKNOWN_NAME;
  const base = path.posix.basename(toPosixPath(filePath));
  const ext = path.posix.extname(base);
  const stem = ext ? base.slice(0, -ext.length) : base;
  const pascal = stem.replace(/_([A-Za-z0-9])/gu, (_match, letter: string) => letter.toUpperCase());
  if (!pascal) return UNKNOWN_NAME;
  return pascal.charAt(0).toUpperCase() + pascal.slice(1);
}

export function inferSymbolName(tagToken: string, origin: FileLocation | null): string {
  if (!tagToken) return UNKNOWN_NAME;
  if (QUALIFIED_MEMBER.test(tagToken)) return tagToken;
  if (!origin || !origin.fileId) return tagToken;

  const moduleName = inferModuleName(origin.fileId);

  const withArity = NAME_WITH_ARITY.exec(tagToken);
  if (withArity) return `${moduleName}.${withArity[1]}/${withArity[2]}`;

  if (BARE_IDENTIFIER.test(tagToken)) return `${moduleName}.${tagToken}`;
  if (DOTTED_MODULE.test(tagToken)) return tagToken;

  return `${moduleName}.${tagToken}`;
}

export function applyNameOptions(name: string, options: SymbolNameOptions): string {
  let out = name;
  if (!options.showArity) out = out.replace(TRAILING_ARITY, '');
  if (!options.showModulePath) {
    const lastDot = out.lastIndexOf('.');
    if (lastDot > 0 && lastDot < out.length - 1) out = out.slice(lastDot + 1);
  }
  return out;
}
