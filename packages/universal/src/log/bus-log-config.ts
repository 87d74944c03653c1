export enum ContractLogLevel {
    None = 0,
    Traffic = 1,
    Args = 2,
    Max = Traffic + Args,
}

/**
 * Controls what a bus connection writes to its logger about calls and signals.
 * `Traffic` logs member names, `Args` also logs the wire strings cut to `argMaxContentLen`.
 */
export interface BusLogConfig {
    level: ContractLogLevel;
    argMaxContentLen: number;
}
