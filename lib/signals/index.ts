import { CommandRunner, runCommand } from '../command';
import { MonitorConfig } from '../config';
import { AccessLogRecencySignal } from './access-log-recency';
import { AccessLogScanSignal } from './access-log-scan';
import { CpuUsageSignal } from './cpu-usage';
import { EstablishedConnectionsSignal } from './established-connections';
import { LoginSessionsSignal } from './login-sessions';
import { NetworkBytesSignal } from './network-bytes';
import { ActivitySignal, SignalKind } from './types';

export * from './types';
export { AccessLogRecencySignal } from './access-log-recency';
export { AccessLogScanSignal } from './access-log-scan';
export { CpuUsageSignal } from './cpu-usage';
export { EstablishedConnectionsSignal } from './established-connections';
export { LoginSessionsSignal } from './login-sessions';
export { NetworkBytesSignal } from './network-bytes';

export const createSignal = (kind: SignalKind, config: MonitorConfig, run: CommandRunner = runCommand): ActivitySignal => {
  switch (kind) {
    case 'access-log-recency':
      return new AccessLogRecencySignal({
        accessLogPath: config.accessLogPath,
        windowSeconds: config.logRecencyWindowSeconds,
      });
    case 'access-log-scan':
      return new AccessLogScanSignal({
        accessLogPath: config.accessLogPath,
        scanLines: config.logScanLines,
        windowSeconds: config.logScanWindowSeconds,
        ignoredClients: config.ignoredClients,
        ignoredUserAgents: config.ignoredUserAgents,
        ignoredPaths: config.ignoredPaths,
      });
    case 'established-connections':
      return new EstablishedConnectionsSignal({ procRoot: config.procRoot, ports: config.applicationPorts });
    case 'login-sessions':
      return new LoginSessionsSignal(run);
    case 'network-bytes':
      return new NetworkBytesSignal({
        procRoot: config.procRoot,
        thresholdBytes: config.networkActivityThresholdBytes,
        networkInterface: config.networkInterface,
      });
    case 'cpu-usage':
      return new CpuUsageSignal({ procRoot: config.procRoot, busyThresholdPercent: config.cpuBusyThresholdPercent });
  }
};

export const createSignals = (config: MonitorConfig, run?: CommandRunner): ActivitySignal[] =>
  config.signals.map(kind => createSignal(kind, config, run));
