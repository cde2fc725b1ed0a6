import type { Facility, FacilityLabel } from './types.js';

function define(numericalCode: number, label: FacilityLabel, description: string): Facility {
  return Object.freeze({ numericalCode, label, description });
}

// RFC 5424 table 1
export const FACILITIES = Object.freeze({
  KERN: define(0, 'KERN', 'Kernel messages'),
  USER: define(1, 'USER', 'User-level messages'),
  MAIL: define(2, 'MAIL', 'Mail system'),
  DAEMON: define(3, 'DAEMON', 'System daemons'),
  AUTH: define(4, 'AUTH', 'Security/authorization messages'),
  SYSLOG: define(5, 'SYSLOG', 'Messages generated internally by syslogd'),
  LPR: define(6, 'LPR', 'Line printer subsystem'),
  NEWS: define(7, 'NEWS', 'Network news subsystem'),
  UUCP: define(8, 'UUCP', 'UUCP subsystem'),
  CRON: define(9, 'CRON', 'Clock daemon'),
  AUTHPRIV: define(10, 'AUTHPRIV', 'Security/authorization messages'),
  FTP: define(11, 'FTP', 'FTP daemon'),
  NTP: define(12, 'NTP', 'NTP subsystem'),
  AUDIT: define(13, 'AUDIT', 'Log audit'),
  ALERT: define(14, 'ALERT', 'Log alert'),
  CLOCK: define(15, 'CLOCK', 'Clock daemon'),
  LOCAL0: define(16, 'LOCAL0', 'Reserved for local use'),
  LOCAL1: define(17, 'LOCAL1', 'Reserved for local use'),
  LOCAL2: define(18, 'LOCAL2', 'Reserved for local use'),
  LOCAL3: define(19, 'LOCAL3', 'Reserved for local use'),
  LOCAL4: define(20, 'LOCAL4', 'Reserved for local use'),
  LOCAL5: define(21, 'LOCAL5', 'Reserved for local use'),
  LOCAL6: define(22, 'LOCAL6', 'Reserved for local use'),
  LOCAL7: define(23, 'LOCAL7', 'Reserved for local use'),
} satisfies Record<FacilityLabel, Facility>);
