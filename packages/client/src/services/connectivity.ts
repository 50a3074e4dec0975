import os from 'os';
import { IConnectivity } from '../domain/ports';

type InterfaceTable = ReturnType<typeof os.networkInterfaces>;

// Any external interface with an address counts; reachability of a given host is not probed
export class NetworkConnectivity implements IConnectivity {
  constructor(private readInterfaces: () => InterfaceTable = () => os.networkInterfaces()) { }

  public hasActiveConnection(): boolean {
    return Object.values(this.readInterfaces()).some(entries =>
      (entries ?? []).some(entry => !entry.internal && entry.address.length > 0)
    );
  }
}
