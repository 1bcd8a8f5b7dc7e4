import { ZERO_TIMESTAMP } from '../types.js';

export const NOW = new Date('2024-05-10T12:00:00Z');

export const processes = [
  { Pid: 100, Ppid: 0, Name: 'chrome.exe', Username: 'alice', Exe: 'C:\\Apps\\chrome.exe', CommandLine: 'chrome.exe --type=browser', StartTime: '2024-05-10T08:00:00Z', CallChain: 'wininit.exe -> explorer.exe -> chrome.exe' },
  { Pid: 200, Ppid: 100, Name: 'curl.exe', Username: 'bob', Exe: 'C:\\Tools\\curl.exe', CommandLine: 'curl.exe https://example.test', StartTime: '2024-05-10T10:00:00Z', CallChain: 'wininit.exe -> explorer.exe -> chrome.exe -> curl.exe' },
  { Pid: 300, Ppid: 0, Name: 'idle', Username: 'SYSTEM', Exe: '', CommandLine: '', StartTime: ZERO_TIMESTAMP, CallChain: '' },
];

export const connections = [
  { Pid: 100, Name: 'chrome.exe', Type: 'TCP', Family: 'IPv4', Status: 'ESTAB', Laddr: '192.168.1.10', Lport: 50000, Raddr: '8.8.8.8', Rport: 443, Username: 'alice', Timestamp: '2024-05-10T11:00:00Z', Authenticode: { Trusted: 'trusted' } },
  { Pid: 100, Name: 'chrome.exe', Type: 'TCP', Family: 'IPv4', Status: 'LISTEN', Laddr: '0.0.0.0', Lport: 443, Raddr: '0.0.0.0', Rport: 0, Username: 'alice', Timestamp: '2024-05-10T11:05:00Z', Authenticode: null },
  { Pid: 200, Name: 'curl.exe', Type: 'TCP', Family: 'IPv4', Status: 'ESTAB', Laddr: '127.0.0.1', Lport: 50001, Raddr: '127.0.0.1', Rport: 8080, Username: 'bob', Timestamp: '2024-05-10T10:30:00Z', Authenticode: { Trusted: 'untrusted' } },
  { Pid: 999, Name: 'ghost.exe', Type: 'UDP', Family: 'IPv4', Status: '', Laddr: '0.0.0.0', Lport: 53, Raddr: '', Rport: 0, Username: 'nobody', Timestamp: '2024-05-10T09:00:00Z' },
  { Pid: 200, Name: 'curl.exe', Type: 'UDP', Family: 'IPv4', Status: 'ESTAB', Laddr: '192.168.1.10', Lport: 60000, Raddr: '8.8.8.8', Rport: 53, Username: 'bob', Timestamp: '2024-05-10T11:10:00Z', Authenticode: null },
];
