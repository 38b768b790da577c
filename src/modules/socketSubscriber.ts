import { Socket } from "socket.io";
import { logger } from "../logger";
import { Subscriber } from "../interfaces/subscriber";
import { SnapshotStore } from "../cache";
import { BroadcastLoop } from "./broadcastLoop";
import { STOCK_UPDATE_EVENT } from "../constants/stocks";

export type SubscriberSocket = Pick<Socket, "id" | "connected" | "emit">;

export type ClientSocket = SubscriberSocket & Pick<Socket, "on">;

export type StockUpdateSources = {
    loop: Pick<BroadcastLoop, "latest" | "subscribe" | "unsubscribe">;
    store: Pick<SnapshotStore, "getLatest">;
};

export function socketSubscriber(socket: SubscriberSocket): Subscriber {
    return {
        id: socket.id,
        isOpen: () => socket.connected,
        send: (payload) => {
            socket.emit(STOCK_UPDATE_EVENT, payload);
        },
    };
}

/**
 * Subscribes a freshly connected client to the broadcast. The loop hands the
 * client its last payload on subscribe; the Valkey snapshot is only read when
 * this process has not broadcast yet (e.g. right after a restart).
 */
export async function attachStockUpdates(
    socket: ClientSocket,
    { loop, store }: StockUpdateSources
): Promise<void> {
    const subscriber = socketSubscriber(socket);

    socket.on("disconnect", (reason) => {
        logger.info({ socketId: socket.id, reason }, "Client disconnected");
        loop.unsubscribe(subscriber);
    });

    if (!loop.latest()) {
        const snapshot = await store.getLatest();
        if (!socket.connected) return;

        if (snapshot && !loop.latest()) {
            socket.emit(STOCK_UPDATE_EVENT, snapshot);
        }
    }

    loop.subscribe(subscriber);
}
