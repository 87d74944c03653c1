import { EventEmitter } from 'events';

import { BusErrorName } from '../contract/bus-command';
import { CallError, UnknownMethodError } from '../errors';
import { marshalArgs, unmarshalArgs, unwrapReturn } from '../marshal/call-marshaler';

import type { BusConnection } from '../bus/bus-connection';
import type { CodecRegistry } from '../codec/codec-registry';
import type { Logger } from '../log/logger';
import type { AnyServiceDescriptor, NamedMethodSignature } from './service-descriptor';

/**
 * Local stand-in for one remote service instance. Calls go out as string arguments,
 * signals of the service come back as local events with decoded values.
 */
export class ImportStub extends EventEmitter {
    private readonly _methods: Map<string, NamedMethodSignature>;

    constructor(
        public readonly descriptor: AnyServiceDescriptor,
        private readonly _connection: BusConnection,
        private readonly _codecs: CodecRegistry,
        private readonly _logger?: Logger
    ) {
        super();
        this._methods = new Map(descriptor.methodList.map((signature) => [signature.name, signature]));

        for (const signature of descriptor.notificationList) {
            this._connection.subscribe(descriptor, signature.name, (args) => {
                const values = unmarshalArgs(this._codecs, signature.name, signature.params, args);
                this.emit(signature.name, ...values);
            });
        }
        this._logger?.info(`[ImportStub] Stub of '${descriptor.serviceName}' on '${_connection.name}' created`);
    }

    /**
     * Resolves with the decoded result. Bus failures reject with `CallError`,
     * decoding failures with whatever the codec threw.
     */
    public async invoke(member: string, args: readonly unknown[]): Promise<unknown> {
        const signature = this._methods.get(member);
        if (!signature) {
            throw new UnknownMethodError(this.descriptor.interfaceName, member);
        }
        const texts = marshalArgs(this._codecs, member, signature.params, args);
        let reply: string;
        try {
            reply = await this._connection.call(this.descriptor, member, texts);
        } catch (error) {
            if (error instanceof CallError) {
                throw error;
            }
            throw new CallError(BusErrorName.Failed, `Call to '${member}' failed: ${error}`);
        }
        return unwrapReturn(this._codecs, signature.returns, reply);
    }
}
