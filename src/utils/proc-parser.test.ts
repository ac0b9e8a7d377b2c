/**
 * Unit tests for /proc parsers
 */

import { describe, it, expect } from '@jest/globals';
import {
  parseCmdlineParam,
  parseFibTrieLocalAddresses,
  parseMemInfo,
  parseModules,
  parseMounts,
  parseRouteTable,
} from './proc-parser.js';

describe('proc parsers', () => {
  describe('parseMemInfo', () => {
    it('should convert kB values to bytes', () => {
      const info = parseMemInfo('MemTotal:        8000000 kB\nMemAvailable:    2000000 kB\nHugePages_Total:       0\n');
      expect(info.get('MemTotal')).toBe(8000000 * 1024);
      expect(info.get('MemAvailable')).toBe(2000000 * 1024);
      expect(info.get('HugePages_Total')).toBe(0);
    });
  });

  describe('parseMounts', () => {
    it('should split fields and decode octal escapes', () => {
      const entries = parseMounts('/dev/sda1 /mnt/backup\\040ssd ext4 rw,relatime 0 0\n');
      expect(entries).toEqual([
        { source: '/dev/sda1', mountpoint: '/mnt/backup ssd', fstype: 'ext4', options: ['rw', 'relatime'] },
      ]);
    });

    it('should skip blank and short lines', () => {
      expect(parseMounts('\nproc /proc\n')).toEqual([]);
    });
  });

  describe('parseCmdlineParam', () => {
    it('should return the value of the named parameter', () => {
      const cmdline = 'console=serial0,115200 root=PARTUUID=abcd-02 rootfstype=ext4 rootwait\n';
      expect(parseCmdlineParam(cmdline, 'root')).toBe('PARTUUID=abcd-02');
      expect(parseCmdlineParam(cmdline, 'rootfstype')).toBe('ext4');
    });

    it('should return null when the parameter is absent', () => {
      expect(parseCmdlineParam('quiet splash', 'root')).toBeNull();
    });
  });

  describe('parseModules', () => {
    it('should read name, size and state', () => {
      const modules = parseModules('hailo_pci 98304 0 - Live 0x0000000000000000\n');
      expect(modules).toEqual([{ name: 'hailo_pci', size: 98304, state: 'Live' }]);
    });
  });

  describe('parseRouteTable', () => {
    const table = [
      'Iface\tDestination\tGateway \tFlags\tRefCnt\tUse\tMetric\tMask\t\tMTU\tWindow\tIRTT',
      'eth0\t00000000\t0101A8C0\t0003\t0\t0\t100\t00000000\t0\t0\t0',
      'eth0\t0001A8C0\t00000000\t0001\t0\t0\t100\t00FFFFFF\t0\t0\t0',
    ].join('\n');

    it('should keep address columns as raw hex', () => {
      expect(parseRouteTable(table)).toEqual([
        { iface: 'eth0', destination: '00000000', gateway: '0101A8C0', flags: 3, metric: 100, mask: '00000000' },
        { iface: 'eth0', destination: '0001A8C0', gateway: '00000000', flags: 1, metric: 100, mask: '00FFFFFF' },
      ]);
    });

    it('should reject content without the header row', () => {
      expect(parseRouteTable('eth0 00000000 0101A8C0 0003 0 0 100 00000000')).toBeNull();
    });
  });

  describe('parseFibTrieLocalAddresses', () => {
    it('should collect addresses with a /32 host LOCAL leaf', () => {
      const trie = [
        'Main:',
        '  +-- 0.0.0.0/0 3 0 5',
        '     |-- 0.0.0.0',
        '        /0 universe UNICAST',
        '     +-- 192.168.1.0/24 2 0 2',
        '        |-- 192.168.1.0',
        '           /24 link UNICAST',
        '        |-- 192.168.1.50',
        '           /32 host LOCAL',
        'Local:',
        '        |-- 192.168.1.50',
        '           /32 host LOCAL',
      ].join('\n');

      expect(parseFibTrieLocalAddresses(trie)).toEqual(['192.168.1.50']);
    });
  });
});
