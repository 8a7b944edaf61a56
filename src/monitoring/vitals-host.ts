// vitals-host.ts - everything the vitals probes read from the machine
import * as os from 'os';
import * as fs from 'fs';
import * as dns from 'dns';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';

const execFileAsync = promisify(execFile);

export interface PlatformIdentity {
  system: string;
  nodeName: string;
  release: string;
  version: string;
  machine: string;
  processor: string;
}

export interface FileSystemUsage {
  bsize: number;
  blocks: number;
  bfree: number;
  bavail: number;
}

export interface MountEntry {
  device: string;
  mountpoint: string;
  fstype: string;
}

/** Byte counts. */
export interface SwapUsage {
  total: number;
  free: number;
}

export interface DiskIoCounters {
  readBytes: number;
  writeBytes: number;
}

export interface NetworkIoCounters {
  bytesSent: number;
  bytesReceived: number;
}

/**
 * Host access for the vitals probes. The Node implementation reads the
 * live machine; tests provide their own.
 */
export interface VitalsHost {
  identity(): PlatformIdentity;
  uptimeSeconds(): number;
  now(): Date;
  cpus(): os.CpuInfo[];
  totalMemory(): number;
  availableMemory(): Promise<number>;
  physicalCoreCount(): Promise<number | null>;
  /** MHz, or null where the platform does not report limits. */
  cpuFrequencyLimits(): Promise<{ max: number; min: number } | null>;
  swapUsage(): Promise<SwapUsage>;
  /** Mounted local disk partitions. */
  listMounts(): Promise<MountEntry[]>;
  statfs(mountpoint: string): Promise<FileSystemUsage>;
  diskIoCounters(): Promise<DiskIoCounters>;
  networkIoCounters(): Promise<NetworkIoCounters>;
  networkInterfaces(): NodeJS.Dict<os.NetworkInterfaceInfo[]>;
  resolveHost(hostname: string): Promise<string>;
  /** Run a program (no shell) and return its stdout; rejects on failure. */
  run(command: string, args: string[]): Promise<string>;
  hasCommand(command: string): Promise<boolean>;
  sleep(ms: number): Promise<void>;
}

// ============================================
// /proc PARSERS
// ============================================

/** Parse /proc/meminfo into byte counts. */
export function parseMeminfo(text: string): Map<string, number> {
  const values = new Map<string, number>();
  for (const line of text.split('\n')) {
    const match = /^(\w+(?:\(\w+\))?):\s+(\d+)(?:\s+kB)?/.exec(line.trim());
    if (match) {
      const unitIsKb = line.includes('kB');
      values.set(match[1], Number(match[2]) * (unitIsKb ? 1024 : 1));
    }
  }
  return values;
}

function requireValue(values: Map<string, number>, key: string): number {
  const value = values.get(key);
  if (value === undefined) {
    throw new Error(`${key} missing from meminfo`);
  }
  return value;
}

const PHYSICAL_DEVICE = /^\/dev\//;

/** Block-device mounts from /proc/mounts, in file order. */
export function parseMounts(text: string): MountEntry[] {
  const mounts: MountEntry[] = [];
  for (const line of text.split('\n')) {
    const [device, rawMountpoint, fstype] = line.trim().split(/\s+/);
    if (!device || !rawMountpoint || !PHYSICAL_DEVICE.test(device)) {
      continue;
    }
    // spaces are escaped as \040
    mounts.push({ device, mountpoint: rawMountpoint.replace(/\\040/g, ' '), fstype: fstype ?? '' });
  }
  return mounts;
}

// Whole-disk and partition names we do not count towards I/O totals.
const VIRTUAL_BLOCK_DEVICE = /^(loop|ram|zram|dm-)/;

export function parseDiskstats(text: string): DiskIoCounters {
  let readBytes = 0;
  let writeBytes = 0;
  for (const line of text.split('\n')) {
    const fields = line.trim().split(/\s+/);
    // major minor name reads merged sectors_read ms writes merged sectors_written ...
    if (fields.length < 10 || VIRTUAL_BLOCK_DEVICE.test(fields[2])) {
      continue;
    }
    readBytes += Number(fields[5]) * 512;
    writeBytes += Number(fields[9]) * 512;
  }
  return { readBytes, writeBytes };
}

export function parseNetDev(text: string): NetworkIoCounters {
  let bytesReceived = 0;
  let bytesSent = 0;
  for (const line of text.split('\n').slice(2)) {
    const [name, counters] = line.split(':');
    if (!name || !counters) {
      continue;
    }
    const fields = counters.trim().split(/\s+/);
    bytesReceived += Number(fields[0]);
    bytesSent += Number(fields[8]);
  }
  return { bytesSent, bytesReceived };
}

export function parseCpuinfoCores(text: string): number | null {
  const cores = new Set<string>();
  let physicalId = '0';
  for (const line of text.split('\n')) {
    const [key, value] = line.split(':').map(part => part.trim());
    if (key === 'physical id') {
      physicalId = value;
    } else if (key === 'core id') {
      cores.add(`${physicalId}:${value}`);
    }
  }
  return cores.size > 0 ? cores.size : null;
}

// ============================================
// CIM QUERIES (Windows)
// ============================================

const MIB = 1024 * 1024;

const LogicalDiskRow = z.object({ DeviceID: z.string(), FileSystem: z.string().nullable() });
const PageFileRow = z.object({ AllocatedBaseSize: z.coerce.number(), CurrentUsage: z.coerce.number() });
const PhysicalDiskRow = z.object({ DiskReadBytesPersec: z.coerce.number(), DiskWriteBytesPersec: z.coerce.number() });
const AdapterStatisticsRow = z.object({ ReceivedBytes: z.coerce.number(), SentBytes: z.coerce.number() });
const ProcessorRow = z.object({ NumberOfCores: z.coerce.number() });

export const CIM_QUERIES = {
  logicalDisks:
    'Get-CimInstance Win32_LogicalDisk -Filter "DriveType=3" | Select-Object DeviceID, FileSystem | ConvertTo-Json',
  pageFiles: 'Get-CimInstance Win32_PageFileUsage | Select-Object AllocatedBaseSize, CurrentUsage | ConvertTo-Json',
  physicalDisks:
    "Get-CimInstance Win32_PerfRawData_PerfDisk_PhysicalDisk -Filter \"Name='_Total'\" | Select-Object DiskReadBytesPersec, DiskWriteBytesPersec | ConvertTo-Json",
  adapterStatistics: 'Get-NetAdapterStatistics | Select-Object ReceivedBytes, SentBytes | ConvertTo-Json',
  processors: 'Get-CimInstance Win32_Processor | Select-Object NumberOfCores | ConvertTo-Json'
} as const;

export class NodeVitalsHost implements VitalsHost {
  private readonly commandTimeoutMs: number;
  private readonly platform: NodeJS.Platform;

  constructor(options: { commandTimeoutMs?: number; platform?: NodeJS.Platform } = {}) {
    this.commandTimeoutMs = options.commandTimeoutMs ?? 60000;
    this.platform = options.platform ?? process.platform;
  }

  identity(): PlatformIdentity {
    return {
      system: os.type(),
      nodeName: os.hostname(),
      release: os.release(),
      version: os.version(),
      machine: os.machine(),
      processor: os.arch()
    };
  }

  uptimeSeconds(): number {
    return os.uptime();
  }

  now(): Date {
    return new Date();
  }

  cpus(): os.CpuInfo[] {
    return os.cpus();
  }

  totalMemory(): number {
    return os.totalmem();
  }

  async availableMemory(): Promise<number> {
    if (this.platform !== 'linux') {
      return os.freemem();
    }
    try {
      return parseMeminfo(await this.readText('/proc/meminfo')).get('MemAvailable') ?? os.freemem();
    } catch {
      // containers without meminfo
      return os.freemem();
    }
  }

  async physicalCoreCount(): Promise<number | null> {
    if (this.platform === 'win32') {
      const rows = await this.queryCim(CIM_QUERIES.processors, ProcessorRow);
      return rows.length > 0 ? rows.reduce((sum, row) => sum + row.NumberOfCores, 0) : null;
    }
    return parseCpuinfoCores(await this.readText('/proc/cpuinfo'));
  }

  async cpuFrequencyLimits(): Promise<{ max: number; min: number } | null> {
    if (this.platform !== 'linux') {
      return null;
    }
    const base = '/sys/devices/system/cpu/cpu0/cpufreq';
    const max = Number((await this.readText(`${base}/cpuinfo_max_freq`)).trim()) / 1000;
    const min = Number((await this.readText(`${base}/cpuinfo_min_freq`)).trim()) / 1000;
    return Number.isFinite(max) && Number.isFinite(min) ? { max, min } : null;
  }

  async swapUsage(): Promise<SwapUsage> {
    if (this.platform === 'win32') {
      const rows = await this.queryCim(CIM_QUERIES.pageFiles, PageFileRow);
      const total = rows.reduce((sum, row) => sum + row.AllocatedBaseSize, 0) * MIB;
      const used = rows.reduce((sum, row) => sum + row.CurrentUsage, 0) * MIB;
      return { total, free: total - used };
    }
    const meminfo = parseMeminfo(await this.readText('/proc/meminfo'));
    return { total: requireValue(meminfo, 'SwapTotal'), free: requireValue(meminfo, 'SwapFree') };
  }

  async listMounts(): Promise<MountEntry[]> {
    if (this.platform === 'win32') {
      const rows = await this.queryCim(CIM_QUERIES.logicalDisks, LogicalDiskRow);
      return rows.map(row => ({ device: `${row.DeviceID}\\`, mountpoint: `${row.DeviceID}\\`, fstype: row.FileSystem ?? '' }));
    }
    return parseMounts(await this.readText('/proc/mounts'));
  }

  async statfs(mountpoint: string): Promise<FileSystemUsage> {
    const stats = await fs.promises.statfs(mountpoint);
    return { bsize: stats.bsize, blocks: stats.blocks, bfree: stats.bfree, bavail: stats.bavail };
  }

  async diskIoCounters(): Promise<DiskIoCounters> {
    if (this.platform === 'win32') {
      const rows = await this.queryCim(CIM_QUERIES.physicalDisks, PhysicalDiskRow);
      return {
        readBytes: rows.reduce((sum, row) => sum + row.DiskReadBytesPersec, 0),
        writeBytes: rows.reduce((sum, row) => sum + row.DiskWriteBytesPersec, 0)
      };
    }
    return parseDiskstats(await this.readText('/proc/diskstats'));
  }

  async networkIoCounters(): Promise<NetworkIoCounters> {
    if (this.platform === 'win32') {
      const rows = await this.queryCim(CIM_QUERIES.adapterStatistics, AdapterStatisticsRow);
      return {
        bytesSent: rows.reduce((sum, row) => sum + row.SentBytes, 0),
        bytesReceived: rows.reduce((sum, row) => sum + row.ReceivedBytes, 0)
      };
    }
    return parseNetDev(await this.readText('/proc/net/dev'));
  }

  networkInterfaces(): NodeJS.Dict<os.NetworkInterfaceInfo[]> {
    return os.networkInterfaces();
  }

  async resolveHost(hostname: string): Promise<string> {
    const { address } = await dns.promises.lookup(hostname, { family: 4 });
    return address;
  }

  async run(command: string, args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(command, args, {
      encoding: 'utf8',
      timeout: this.commandTimeoutMs,
      maxBuffer: 32 * 1024 * 1024,
      windowsHide: true
    });
    return stdout;
  }

  async hasCommand(command: string): Promise<boolean> {
    try {
      await execFileAsync(command, ['--version'], { timeout: 10000, windowsHide: true });
      return true;
    } catch {
      return false;
    }
  }

  sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  protected readText(filePath: string): Promise<string> {
    return fs.promises.readFile(filePath, 'utf8');
  }

  /**
   * Run a PowerShell query ending in ConvertTo-Json. A single result comes
   * back as an object and no result as empty output; both become arrays.
   */
  private async queryCim<T>(script: string, row: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const encodedCommand = Buffer.from(script, 'utf16le').toString('base64');
    const output = await this.run('powershell.exe', [
      '-NoProfile',
      '-NonInteractive',
      '-ExecutionPolicy',
      'Bypass',
      '-EncodedCommand',
      encodedCommand
    ]);
    if (!output.trim()) {
      return [];
    }
    const parsed: unknown = JSON.parse(output);
    return z.array(row).parse(Array.isArray(parsed) ? parsed : [parsed]);
  }
}
