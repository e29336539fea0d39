export { ConnectivityProbe, DEFAULT_PROBE_SETTINGS, type ProbeSettings, type ProbeTarget } from './connectivity.js';
export { SshManagementChannel, type ManagementChannel, type SshCredential, type SshChannelOptions } from './ssh.js';
