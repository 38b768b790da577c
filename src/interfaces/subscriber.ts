import { StockUpdatePayload } from "./stockUpdate";

export interface Subscriber {
    readonly id: string;
    isOpen(): boolean;
    send(payload: StockUpdatePayload): void | Promise<void>;
}
