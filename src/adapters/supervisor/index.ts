export * from './types';
export { SystemdSupervisor } from './systemd';
export { InMemorySupervisor } from './memory';
