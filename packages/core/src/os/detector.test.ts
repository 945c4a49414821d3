/**
 * Tests for OSDetector
 */

import { OSDetector } from './detector.js';
import { OperatingSystem, LinuxDistribution } from '../types/common.js';

describe('OSDetector', () => {
  describe('classify', () => {
    const cases: Array<[string, OperatingSystem]> = [
      ['linux-gnu', OperatingSystem.LINUX],
      ['linux-gnueabihf', OperatingSystem.LINUX],
      ['darwin23', OperatingSystem.MACOS],
      ['Darwin', OperatingSystem.MACOS],
      ['cygwin', OperatingSystem.WINDOWS],
      ['msys', OperatingSystem.WINDOWS],
      ['MSYS', OperatingSystem.WINDOWS],
      ['win32', OperatingSystem.WINDOWS],
    ];

    it.each(cases)('classifies %s as %s', (indicator, expected) => {
      expect(OSDetector.classify(indicator)).toBe(expected);
    });

    it.each(['freebsd13.2', 'linux-musl', 'solaris', '', 'gnu-linux'])('returns unknown for %p', (indicator) => {
      expect(OSDetector.classify(indicator)).toBe(OperatingSystem.UNKNOWN);
    });
  });

  describe('resolveIndicator', () => {
    it('prefers OSTYPE when exported', () => {
      expect(OSDetector.resolveIndicator({ OSTYPE: 'darwin22', MSYSTEM: 'MINGW64' }, 'linux')).toBe('darwin22');
    });

    it('uses msys when MSYSTEM is set', () => {
      expect(OSDetector.resolveIndicator({ MSYSTEM: 'MINGW64' }, 'win32')).toBe('msys');
    });

    it('maps the Node platform otherwise', () => {
      expect(OSDetector.resolveIndicator({}, 'linux')).toBe('linux-gnu');
      expect(OSDetector.resolveIndicator({}, 'darwin')).toBe('darwin');
      expect(OSDetector.resolveIndicator({}, 'win32')).toBe('win32');
      expect(OSDetector.resolveIndicator({}, 'aix')).toBe('aix');
    });
  });

  describe('detect', () => {
    it('classifies the resolved indicator', () => {
      expect(OSDetector.detect({}, 'linux')).toBe(OperatingSystem.LINUX);
      expect(OSDetector.detect({}, 'openbsd')).toBe(OperatingSystem.UNKNOWN);
    });
  });

  describe('detectLinuxDistro', () => {
    const probe = (present: string[]) => async (filePath: string) => present.includes(filePath);

    it('detects debian from /etc/debian_version', async () => {
      expect(await OSDetector.detectLinuxDistro(probe(['/etc/debian_version']))).toBe(LinuxDistribution.DEBIAN);
    });

    it('prefers fedora over the generic redhat marker', async () => {
      const distro = await OSDetector.detectLinuxDistro(probe(['/etc/redhat-release', '/etc/fedora-release']));
      expect(distro).toBe(LinuxDistribution.FEDORA);
    });

    it('prefers debian when several markers exist', async () => {
      const distro = await OSDetector.detectLinuxDistro(
        probe(['/etc/redhat-release', '/etc/fedora-release', '/etc/debian_version'])
      );
      expect(distro).toBe(LinuxDistribution.DEBIAN);
    });

    it('detects redhat from /etc/redhat-release alone', async () => {
      expect(await OSDetector.detectLinuxDistro(probe(['/etc/redhat-release']))).toBe(LinuxDistribution.REDHAT);
    });

    it('returns unsupported when no marker exists', async () => {
      expect(await OSDetector.detectLinuxDistro(probe([]))).toBe(LinuxDistribution.UNSUPPORTED);
    });
  });

  describe('isPosixLayer', () => {
    it('is true inside Git Bash', () => {
      expect(OSDetector.isPosixLayer({ MSYSTEM: 'MINGW64' }, 'win32')).toBe(true);
    });

    it('is true for a cygwin OSTYPE', () => {
      expect(OSDetector.isPosixLayer({ OSTYPE: 'cygwin' }, 'win32')).toBe(true);
    });

    it('is false for a plain Windows console', () => {
      expect(OSDetector.isPosixLayer({}, 'win32')).toBe(false);
    });
  });

  describe('getOSName', () => {
    it('names the distribution on Linux', () => {
      expect(OSDetector.getOSName(OperatingSystem.LINUX, LinuxDistribution.FEDORA)).toBe('Fedora Linux');
      expect(OSDetector.getOSName(OperatingSystem.LINUX, LinuxDistribution.UNSUPPORTED)).toBe('Linux');
      expect(OSDetector.getOSName(OperatingSystem.MACOS)).toBe('macOS');
    });
  });
});
