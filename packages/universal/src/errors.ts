export const ErrorCode = {
    DEFINITION: 'DEFINITION_ERROR',
    REGISTRATION_FAILED: 'REGISTRATION_FAILED',
    NOT_CONNECTED: 'NOT_CONNECTED',
    CALL_FAILED: 'CALL_FAILED',
    CONVERSION_FAILED: 'CONVERSION_FAILED',
    ARGUMENT_COUNT: 'ARGUMENT_COUNT',
    UNKNOWN_METHOD: 'UNKNOWN_METHOD',
    BUS_NOT_CONFIGURED: 'BUS_NOT_CONFIGURED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class of every error raised by the service layer.
 * The `code` survives the trip over the bus as the name of an error reply.
 */
export abstract class BusProxyError extends Error {
    abstract readonly code: ErrorCodeType;

    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace?.(this, this.constructor);
    }

    toJSON() {
        return {
            message: this.message,
            name: this.name,
            code: this.code,
            stack: this.stack,
        };
    }
}

/**
 * Raised while a service is being defined or an implementation is checked against it:
 * invalid names, missing codecs, missing methods.
 */
export class DefinitionError extends BusProxyError {
    readonly code = ErrorCode.DEFINITION;
}

export class RegistrationError extends BusProxyError {
    readonly code = ErrorCode.REGISTRATION_FAILED;
}

/**
 * Raised by an access facade that has no import stub yet. Never reaches the bus.
 */
export class NotConnectedError extends BusProxyError {
    readonly code = ErrorCode.NOT_CONNECTED;

    constructor(
        public readonly serviceName: string,
        public readonly methodName: string
    ) {
        super(`Cannot call '${methodName}': service '${serviceName}' is not connected`);
    }
}

/**
 * Bus-level failure of a remote call. `busErrorName` is the name carried by the error reply,
 * either a bus condition (`ServiceUnknown`, `NoReply`, ...) or the code of the remote error.
 */
export class CallError extends BusProxyError {
    readonly code = ErrorCode.CALL_FAILED;

    constructor(
        public readonly busErrorName: string,
        message: string
    ) {
        super(message);
    }
}

export class ConversionError extends BusProxyError {
    readonly code = ErrorCode.CONVERSION_FAILED;

    constructor(kindId: string, text: string) {
        super(`Cannot convert '${text}' to ${kindId}`);
    }
}

export class ArgumentCountError extends BusProxyError {
    readonly code = ErrorCode.ARGUMENT_COUNT;

    constructor(member: string, expected: number, received: number) {
        super(`'${member}' expects ${expected} argument(s), received ${received}`);
    }
}

export class UnknownMethodError extends BusProxyError {
    readonly code = ErrorCode.UNKNOWN_METHOD;

    constructor(interfaceName: string, methodName: string) {
        super(`Interface '${interfaceName}' has no method '${methodName}'`);
    }
}

export class BusNotConfiguredError extends BusProxyError {
    readonly code = ErrorCode.BUS_NOT_CONFIGURED;

    constructor(busKey: string) {
        super(`No connection is configured for bus '${busKey}'`);
    }
}

export function hasErrorCode(err: unknown): err is Error & { code: string } {
    return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function getErrorCode(err: unknown): string | undefined {
    if (hasErrorCode(err)) {
        return err.code;
    }
    return undefined;
}
