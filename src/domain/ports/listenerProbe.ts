// Port: Listener Probe
// Is host:port bound, and by which processes where the OS tells us

import { BindAddress, ListenerInfo } from '../types/process';

export interface ListenerProbePort {
  probe(address: BindAddress): Promise<ListenerInfo>;
}
