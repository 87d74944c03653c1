import type { BrokerServer } from './broker-server';
import type { ResolvedConnectOptions } from '../client/connect-options';

export interface BrokerServerFactory {
    create(options: ResolvedConnectOptions): Promise<BrokerServer>;
}
