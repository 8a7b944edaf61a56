// vitals-collector.ts - point-in-time snapshot of the host
// Each category is collected by its own probe; a failing probe drops only
// its own category from the tree.

import * as os from 'os';
import { ComponentLogger } from '../common/logger';
import { CollectionSubProbeError, describeError, errorCode } from '../common/errors';
import { VitalsTree, VitalsValue } from '../types';
import { VitalsHost } from './vitals-host';

const SIZE_UNITS = ['', 'K', 'M', 'G', 'T', 'P'];

/**
 * Human readable size, e.g. 1253656 => '1.20MB'.
 */
export function formatSize(bytes: number, suffix: string = 'B'): string {
  const factor = 1024;
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < factor) {
      return `${size.toFixed(2)}${unit}${suffix}`;
    }
    size /= factor;
  }
  throw new RangeError('Size is too large');
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function percent(part: number, whole: number): number {
  return whole > 0 ? round1((part / whole) * 100) : 0;
}

/**
 * Busy percentage per core between two os.cpus() samples.
 */
export function cpuUsage(before: os.CpuInfo[], after: os.CpuInfo[]): { perCore: number[]; total: number } {
  let busyTotal = 0;
  let allTotal = 0;
  const perCore = after.map((cpu, index) => {
    const previous = before[index]?.times ?? { user: 0, nice: 0, sys: 0, idle: 0, irq: 0 };
    const idle = cpu.times.idle - previous.idle;
    const total =
      (cpu.times.user - previous.user) +
      (cpu.times.nice - previous.nice) +
      (cpu.times.sys - previous.sys) +
      (cpu.times.irq - previous.irq) +
      idle;
    busyTotal += total - idle;
    allTotal += total;
    return total > 0 ? round1(((total - idle) / total) * 100) : 0;
  });
  return { perCore, total: allTotal > 0 ? round1((busyTotal / allTotal) * 100) : 0 };
}

// statfs failures that only mean we may not look at the partition
const DENIED_CODES = new Set(['EACCES', 'EPERM']);

export class VitalsCollector {
  private logger: ComponentLogger;
  private host: VitalsHost;
  private cpuSampleMs: number;

  constructor(host: VitalsHost, logger: ComponentLogger, options: { cpuSampleMs?: number } = {}) {
    this.host = host;
    this.logger = logger;
    this.cpuSampleMs = options.cpuSampleMs ?? 1000;
  }

  async collect(): Promise<VitalsTree> {
    const probes: Array<[string, () => Promise<VitalsValue>]> = [
      ['system_info', () => this.getSystemInfo()],
      ['boot_time', () => this.getBootTime()],
      ['cpu_info', () => this.getCpuInfo()],
      ['memory_info', () => this.getMemoryInfo()],
      ['swap_info', () => this.getSwapInfo()],
      ['disk_info', () => this.getDiskInfo()],
      ['network_info', () => this.getNetworkInfo()]
    ];

    if (await this.host.hasCommand('pip')) {
      probes.push(['python_packages', () => this.getPythonPackages()]);
    }
    if (await this.host.hasCommand('dpkg')) {
      probes.push(['deb_packages', () => this.getDebPackages()]);
    }
    if (await this.host.hasCommand('rpm')) {
      probes.push(['rpm_packages', () => this.getRpmPackages()]);
    }

    const tree: VitalsTree = {};
    for (const [name, probe] of probes) {
      try {
        tree[name] = await probe();
      } catch (error) {
        const failure = new CollectionSubProbeError(name, { cause: error });
        this.logger.warn(failure.message, { probe: name });
      }
    }
    return tree;
  }

  async getSystemInfo(): Promise<VitalsValue> {
    const identity = this.host.identity();
    return {
      system: identity.system,
      node_name: identity.nodeName,
      release: identity.release,
      version: identity.version,
      machine: identity.machine,
      processor: identity.processor
    };
  }

  async getBootTime(): Promise<VitalsValue> {
    const bootMs = this.host.now().getTime() - this.host.uptimeSeconds() * 1000;
    return { boot_time: new Date(Math.round(bootMs / 1000) * 1000).toISOString() };
  }

  async getCpuInfo(): Promise<VitalsValue> {
    const before = this.host.cpus();
    if (before.length === 0) {
      throw new Error('No CPU information available');
    }
    await this.host.sleep(this.cpuSampleMs);
    const after = this.host.cpus();
    const usage = cpuUsage(before, after);

    const speeds = after.map(cpu => cpu.speed);
    const frequency = await this.optional('CPU frequency limits', () => this.host.cpuFrequencyLimits());

    return {
      cpu_brand: after[0].model.trim(),
      physical_cores: await this.optional('Physical core count', () => this.host.physicalCoreCount()),
      total_cores: after.length,
      max_frequency: frequency?.max ?? Math.max(...speeds),
      min_frequency: frequency?.min ?? Math.min(...speeds),
      current_frequency: round1(speeds.reduce((sum, speed) => sum + speed, 0) / speeds.length),
      cpu_usage_per_core: usage.perCore,
      total_cpu_usage: usage.total
    };
  }

  async getMemoryInfo(): Promise<VitalsValue> {
    const total = this.host.totalMemory();
    const available = await this.host.availableMemory();
    const used = total - available;
    return {
      total: formatSize(total),
      available: formatSize(available),
      used: formatSize(used),
      percentage: percent(used, total)
    };
  }

  async getSwapInfo(): Promise<VitalsValue> {
    const { total, free } = await this.host.swapUsage();
    const used = total - free;
    return {
      total: formatSize(total),
      free: formatSize(free),
      used: formatSize(used),
      percentage: percent(used, total)
    };
  }

  async getDiskInfo(): Promise<VitalsValue> {
    const mounts = await this.host.listMounts();
    const seen = new Set<string>();
    const partitions: VitalsValue[] = [];

    for (const { device, mountpoint, fstype } of mounts) {
      if (seen.has(mountpoint)) {
        continue;
      }
      seen.add(mountpoint);

      try {
        const usage = await this.host.statfs(mountpoint);
        const total = usage.blocks * usage.bsize;
        const free = usage.bavail * usage.bsize;
        const used = (usage.blocks - usage.bfree) * usage.bsize;
        partitions.push({
          device,
          mountpoint,
          fstype,
          total_size: formatSize(total),
          used: formatSize(used),
          free: formatSize(free),
          percentage: percent(used, used + free)
        });
      } catch (error) {
        const code = errorCode(error);
        if (code !== undefined && DENIED_CODES.has(code)) {
          this.logger.warn('Skipping unreadable partition', { device, mountpoint, code }, error);
        } else {
          this.logger.error('Failed to read partition usage', error, { device, mountpoint, code });
        }
      }
    }

    const diskInfo: { [key: string]: VitalsValue } = { partitions };
    try {
      diskInfo.disk_io = await this.getDiskIo();
    } catch (error) {
      this.logger.warn('Disk I/O counters unavailable', undefined, error);
    }
    return diskInfo;
  }

  async getNetworkInfo(): Promise<VitalsValue> {
    const interfaces: { [name: string]: VitalsValue } = {};
    for (const [name, addresses] of Object.entries(this.host.networkInterfaces())) {
      interfaces[name] = (addresses ?? []).map(address => ({
        address: address.address,
        netmask: address.netmask,
        broadcast: address.family === 'IPv4' ? ipv4Broadcast(address.address, address.netmask) : null,
        family: address.family === 'IPv4' ? 'AF_INET' : 'AF_INET6'
      }));
    }

    const hostName = this.host.identity().nodeName;
    let ipAddress: string | null = null;
    try {
      ipAddress = await this.host.resolveHost(hostName);
    } catch (error) {
      this.logger.warn('Could not resolve the host name', { hostName }, error);
    }

    const networkInfo: { [key: string]: VitalsValue } = {
      host_name: hostName,
      ip_address: ipAddress,
      interfaces
    };
    try {
      networkInfo.io_counters = await this.getNetworkIo();
    } catch (error) {
      this.logger.warn('Network I/O counters unavailable', undefined, error);
    }
    return networkInfo;
  }

  async getPythonPackages(): Promise<VitalsValue> {
    try {
      const output = await this.host.run('pip', ['list']);
      return output
        .trim()
        .split('\n')
        .slice(2) // header and ruler
        .map(line => line.trim().split(/\s+/).slice(0, 2))
        .filter(fields => fields.length === 2);
    } catch (error) {
      this.logger.error('Failed to list pip packages', error);
      return { pip_error: describeError(error) };
    }
  }

  async getDebPackages(): Promise<VitalsValue> {
    try {
      const output = await this.host.run('dpkg', ['-l']);
      return output
        .trim()
        .split('\n')
        .filter(line => line.startsWith('ii'))
        .map(line => line.trim().split(/\s+/).slice(1, 3));
    } catch (error) {
      this.logger.error('Failed to list dpkg packages', error);
      return { dpkg_error: describeError(error) };
    }
  }

  async getRpmPackages(): Promise<VitalsValue> {
    try {
      const output = await this.host.run('rpm', ['-qa']);
      return output.trim().split('\n').filter(line => line.length > 0);
    } catch (error) {
      this.logger.error('Failed to list rpm packages', error);
      return { rpm_error: describeError(error) };
    }
  }

  private async getDiskIo(): Promise<VitalsValue> {
    const counters = await this.host.diskIoCounters();
    return { total_read: formatSize(counters.readBytes), total_write: formatSize(counters.writeBytes) };
  }

  private async getNetworkIo(): Promise<VitalsValue> {
    const counters = await this.host.networkIoCounters();
    return { bytes_sent: formatSize(counters.bytesSent), bytes_recv: formatSize(counters.bytesReceived) };
  }

  private async optional<T>(what: string, read: () => Promise<T | null>): Promise<T | null> {
    try {
      return await read();
    } catch (error) {
      this.logger.debug(`${what} unavailable`, { error: describeError(error) });
      return null;
    }
  }
}

export function ipv4Broadcast(address: string, netmask: string): string | null {
  const addressParts = address.split('.').map(Number);
  const maskParts = netmask.split('.').map(Number);
  if (addressParts.length !== 4 || maskParts.length !== 4) {
    return null;
  }
  return addressParts.map((part, index) => (part | (~maskParts[index] & 255)) & 255).join('.');
}
