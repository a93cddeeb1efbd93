import { ListenerProbePort } from '../../../domain/ports/listenerProbe';
import { BindAddress, ListenerInfo } from '../../../domain/types/process';
import { probeListener } from '../../connectors/os/network/listenerProbe';

export class ListenerProbeAdapter implements ListenerProbePort {
  async probe(address: BindAddress): Promise<ListenerInfo> {
    return probeListener(address);
  }
}
