import { Quote } from "./quote";

export interface StockUpdatePayload {
    type: "stock_update";
    data: Quote[];
    timestamp: string;
}

export function toStockUpdate(data: Quote[]): StockUpdatePayload {
    return {
        type: "stock_update",
        data,
        timestamp: new Date().toISOString(),
    };
}
