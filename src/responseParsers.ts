import { ParseError } from './errors.js';

export interface Workload {
  readonly name: string;
  readonly uuid: string;
  readonly imageUuid: string;
  readonly cpus: string;
  readonly memory: string;
}

export interface Tenant {
  readonly uuid: string;
  readonly name: string;
}

export interface Instance {
  readonly uuid: string;
  readonly status: string;
  readonly ip: string;
  readonly mac: string;
  readonly computeNodeUuid: string;
  readonly imageUuid: string;
  readonly tenantUuid: string;
}

export interface Cnci {
  readonly uuid: string;
  readonly tenantUuid: string;
  readonly ip: string;
}

/**
 * Raw tokens from `node status`. Kept as strings on purpose, see isClusterReady.
 */
export interface NodeStatusSummary {
  readonly total: string;
  readonly ready: string;
}

export type FieldSeparator = ':' | 'whitespace';

/**
 * Describes one header-introduced block in ciao-cli list output.
 */
export interface BlockFormat<K extends string> {
  readonly header: string;
  readonly separator: FieldSeparator;
  readonly fields: readonly K[];
}

const WORKLOAD_FORMAT: BlockFormat<keyof Workload> = {
  header: 'Workload',
  separator: ':',
  fields: ['name', 'uuid', 'imageUuid', 'cpus', 'memory']
};

const TENANT_FORMAT: BlockFormat<keyof Tenant> = {
  header: 'Tenant',
  separator: 'whitespace',
  fields: ['uuid', 'name']
};

const INSTANCE_FORMAT: BlockFormat<keyof Instance> = {
  header: 'Instance',
  separator: ':',
  fields: ['uuid', 'status', 'ip', 'mac', 'computeNodeUuid', 'imageUuid', 'tenantUuid']
};

const CNCI_FORMAT: BlockFormat<keyof Cnci> = {
  header: 'CNCI',
  separator: ':',
  fields: ['uuid', 'tenantUuid', 'ip']
};

const DELETE_ACK_MARKER = 'os-delete';

/**
 * Value of a `Label: value` line: everything after the first separator, trimmed.
 */
function fieldValue(line: string, separator: FieldSeparator, field: string): string {
  const trimmed = line.trim();
  const index = separator === ':' ? trimmed.indexOf(':') : trimmed.search(/\s/);
  if (index === -1) {
    throw new ParseError(`Missing separator in "${field}" field`, line);
  }
  return trimmed.slice(index + 1).trim();
}

export type BlockFields<K extends string> = ReadonlyMap<K, string>;

/**
 * Split header-introduced blocks into field maps.
 *
 * The N lines after a header are taken as the N fields whatever they contain;
 * a truncated block throws instead of yielding a partial record.
 */
export function parseBlocks<K extends string>(
  lines: readonly string[],
  format: BlockFormat<K>
): BlockFields<K>[] {
  const blocks: BlockFields<K>[] = [];
  let index = 0;

  while (index < lines.length) {
    const line = lines[index] ?? '';
    index += 1;
    if (!line.startsWith(format.header)) {
      continue;
    }

    if (index + format.fields.length > lines.length) {
      throw new ParseError(
        `Truncated ${format.header} block: expected ${String(format.fields.length)} fields, found ${String(lines.length - index)}`,
        [line, ...lines.slice(index)].join('\n')
      );
    }

    const block = new Map<K, string>();
    format.fields.forEach((field, offset) => {
      block.set(field, fieldValue(lines[index + offset] ?? '', format.separator, field));
    });
    index += format.fields.length;

    blocks.push(block);
  }

  return blocks;
}

function read<K extends string>(block: BlockFields<K>, field: K): string {
  const value = block.get(field);
  if (value === undefined) {
    throw new ParseError(`Missing "${field}" field`, '');
  }
  return value;
}

export function parseWorkloads(lines: readonly string[]): Workload[] {
  return parseBlocks(lines, WORKLOAD_FORMAT).map(block => ({
    name: read(block, 'name'),
    uuid: read(block, 'uuid'),
    imageUuid: read(block, 'imageUuid'),
    cpus: read(block, 'cpus'),
    memory: read(block, 'memory')
  }));
}

export function parseTenants(lines: readonly string[]): Tenant[] {
  return parseBlocks(lines, TENANT_FORMAT).map(block => ({
    uuid: read(block, 'uuid'),
    name: read(block, 'name')
  }));
}

export function parseInstances(lines: readonly string[]): Instance[] {
  return parseBlocks(lines, INSTANCE_FORMAT).map(block => ({
    uuid: read(block, 'uuid'),
    status: read(block, 'status'),
    ip: read(block, 'ip'),
    mac: read(block, 'mac'),
    computeNodeUuid: read(block, 'computeNodeUuid'),
    imageUuid: read(block, 'imageUuid'),
    tenantUuid: read(block, 'tenantUuid')
  }));
}

export function parseCncis(lines: readonly string[]): Cnci[] {
  return parseBlocks(lines, CNCI_FORMAT).map(block => ({
    uuid: read(block, 'uuid'),
    tenantUuid: read(block, 'tenantUuid'),
    ip: read(block, 'ip')
  }));
}

function lastToken(line: string | undefined): string | undefined {
  return (line ?? '')
    .trim()
    .split(/\s+/)
    .filter(token => token.length > 0)
    .at(-1);
}

/**
 * `node status` prints the total on its first line and the ready count on its
 * second; the count is the last token of each, whatever label precedes it.
 */
export function parseNodeStatus(lines: readonly string[]): NodeStatusSummary {
  const total = lastToken(lines[0]);
  const ready = lastToken(lines[1]);

  if (total === undefined || ready === undefined) {
    throw new ParseError('Unexpected node status output', lines.slice(0, 2).join('\n'));
  }

  return { total, ready };
}

/**
 * Opaque string comparison: `05` and `5` are not equal.
 */
export function isClusterReady(summary: NodeStatusSummary): boolean {
  return summary.total === summary.ready;
}

/**
 * UUIDs from `instance add` output, one `Created new instance: <uuid>` per line.
 */
export function parseCreatedInstances(lines: readonly string[]): string[] {
  return lines
    .filter(line => line.trim() !== '')
    .map(line => {
      const uuid = fieldValue(line, ':', 'uuid');
      if (!uuid) {
        throw new ParseError('Empty instance uuid', line);
      }
      return uuid;
    });
}

/**
 * Literal prefix check on the delete-all acknowledgement.
 */
export function isDeleteAcknowledged(lines: readonly string[]): boolean {
  return lines.join('\n').startsWith(DELETE_ACK_MARKER);
}
