/**
 * Parsers for /proc and /sys text formats.
 * Pure functions over file contents; reading is left to the caller.
 */

export interface MountEntry {
  source: string;
  mountpoint: string;
  fstype: string;
  options: string[];
}

export interface RouteEntry {
  iface: string;
  destination: string;
  gateway: string;
  flags: number;
  metric: number;
  mask: string;
}

export interface ModuleEntry {
  name: string;
  size: number;
  state: string;
}

/**
 * Parse /proc/meminfo into key-value map (bytes)
 */
export function parseMemInfo(content: string): Map<string, number> {
  const memInfo = new Map<string, number>();

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex > 0) {
      const key = trimmed.substring(0, colonIndex).trim();
      const valuePart = trimmed.substring(colonIndex + 1).trim();

      const match = valuePart.match(/^(\d+)/);
      if (match && match[1]) {
        const value = parseInt(match[1], 10);
        // Most values in meminfo are in kB
        memInfo.set(key, valuePart.includes('kB') ? value * 1024 : value);
      }
    }
  }

  return memInfo;
}

/**
 * Parse a mount table (/proc/mounts format). Octal escapes in paths
 * (\040 for a space) are decoded.
 */
export function parseMounts(content: string): MountEntry[] {
  const entries: MountEntry[] = [];

  for (const line of content.split('\n')) {
    const [source, mountpoint, fstype, options] = line.trim().split(/\s+/);
    if (!source || !mountpoint || !fstype) continue;

    entries.push({
      source: decodeOctalEscapes(source),
      mountpoint: decodeOctalEscapes(mountpoint),
      fstype,
      options: options ? options.split(',') : [],
    });
  }

  return entries;
}

function decodeOctalEscapes(value: string): string {
  return value.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

/**
 * Extract the value of a key=value token from the kernel command line
 */
export function parseCmdlineParam(content: string, key: string): string | null {
  for (const token of content.trim().split(/\s+/)) {
    if (token.startsWith(`${key}=`)) {
      return token.substring(key.length + 1);
    }
  }
  return null;
}

/**
 * Parse /proc/modules
 */
export function parseModules(content: string): ModuleEntry[] {
  const modules: ModuleEntry[] = [];

  for (const line of content.split('\n')) {
    const parts = line.trim().split(/\s+/);
    const [name, size, , , state] = parts;
    if (!name || !size) continue;

    modules.push({
      name,
      size: parseInt(size, 10),
      state: state ?? 'Unknown',
    });
  }

  return modules;
}

/**
 * Parse /proc/net/route. Address columns stay as the raw hex text;
 * converting them is byte-order sensitive and left to the caller.
 */
export function parseRouteTable(content: string): RouteEntry[] | null {
  const lines = content.split('\n').filter((line) => line.trim() !== '');
  const header = lines[0]?.trim().split(/\s+/);
  if (!header || header[0] !== 'Iface') {
    return null;
  }

  const column = (name: string): number => header.indexOf(name);
  const indexes = {
    iface: column('Iface'),
    destination: column('Destination'),
    gateway: column('Gateway'),
    flags: column('Flags'),
    metric: column('Metric'),
    mask: column('Mask'),
  };
  if (Object.values(indexes).some((index) => index < 0)) {
    return null;
  }

  const entries: RouteEntry[] = [];
  for (const line of lines.slice(1)) {
    const cells = line.trim().split(/\s+/);
    const iface = cells[indexes.iface];
    const destination = cells[indexes.destination];
    const gateway = cells[indexes.gateway];
    const flags = cells[indexes.flags];
    const metric = cells[indexes.metric];
    const mask = cells[indexes.mask];
    if (!iface || !destination || !gateway || !flags || !metric || !mask) continue;

    entries.push({
      iface,
      destination,
      gateway,
      flags: parseInt(flags, 16),
      metric: parseInt(metric, 10),
      mask,
    });
  }

  return entries;
}

/**
 * Collect the local host addresses from a /proc/net/fib_trie dump:
 * every address followed by a "/32 host LOCAL" leaf
 */
export function parseFibTrieLocalAddresses(content: string): string[] {
  const addresses: string[] = [];
  let lastAddress: string | null = null;

  for (const line of content.split('\n')) {
    const addressMatch = line.match(/[|+]--\s+(\d{1,3}(?:\.\d{1,3}){3})\s*$/);
    if (addressMatch && addressMatch[1]) {
      lastAddress = addressMatch[1];
      continue;
    }

    if (lastAddress && /\/32 host LOCAL/.test(line)) {
      if (!addresses.includes(lastAddress)) {
        addresses.push(lastAddress);
      }
      lastAddress = null;
    }
  }

  return addresses;
}
