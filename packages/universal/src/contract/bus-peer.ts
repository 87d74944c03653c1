export interface BusPeer {
    id: string;
    name: string;
}
