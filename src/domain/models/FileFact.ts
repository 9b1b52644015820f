/**
 * FileFact Domain Model
 * Immutable per-evaluation snapshot of one scanned file's metadata
 */
import type { FileLocationKind } from '../../shared/constants';
import { normalizeExtension } from '../../shared/filenameMatching';

export type FileStatus = 'pending' | 'ready' | 'skipped';

export interface FileFact {
  readonly name: string;
  /** Lower-cased, without the leading dot */
  readonly extension: string;
  readonly path: string;
  readonly size: number;
  readonly createdAt: Date;
  readonly modifiedAt: Date;
  readonly accessedAt: Date;
  readonly location?: FileLocationKind;
  /** Status carried over from a previous scan, if any */
  readonly status?: FileStatus;
}

export interface FileFactInput {
  path: string;
  name?: string;
  extension?: string;
  size: number;
  createdAt: Date;
  modifiedAt?: Date;
  accessedAt?: Date;
  location?: FileLocationKind;
  status?: FileStatus;
}

/**
 * Build a frozen FileFact, deriving name and extension from the path when omitted
 */
export function createFileFact(input: FileFactInput): FileFact {
  const name = input.name ?? input.path.split(/[\\/]/).pop() ?? '';
  const dotIndex = name.lastIndexOf('.');
  const derivedExtension = dotIndex > 0 ? name.slice(dotIndex + 1) : '';

  return Object.freeze({
    name,
    extension: normalizeExtension(input.extension ?? derivedExtension),
    path: input.path,
    size: input.size,
    createdAt: input.createdAt,
    modifiedAt: input.modifiedAt ?? input.createdAt,
    accessedAt: input.accessedAt ?? input.modifiedAt ?? input.createdAt,
    location: input.location,
    status: input.status,
  });
}
