import { EntityId, TriggerEvent } from '../wiggle/types';

export interface WiggleEvents {
    /** Host selection changed; the listed entities are the drag targets. */
    ENTITY_SELECTED: { entityIds: EntityId[] };
    /** One per frame per tracked entity, timestamp in seconds. */
    ENTITY_MOVED: { entityId: EntityId; x: number; y: number; timestamp: number };
    DETECTION_TOGGLED: { enabled: boolean };
    /** Manual "disconnect now" action from the host. */
    DISCONNECT_REQUESTED: { entityIds: EntityId[] };
    WIGGLE_TRIGGERED: TriggerEvent;
    LINKS_SEVERED: { entityId: EntityId; removed: number };
}

export type WiggleChannel = keyof WiggleEvents;
export type Listener<K extends WiggleChannel> = (payload: WiggleEvents[K]) => void;

// Method syntax keeps the parameter bivariant, so a channel-specific
// Listener<K> can be stored under the shared channel map.
type StoredListener = {
    bivarianceHack(payload: WiggleEvents[WiggleChannel]): void;
}['bivarianceHack'];

export class EventBus {
    private subscribers: Map<WiggleChannel, Set<StoredListener>> = new Map();

    public subscribe<K extends WiggleChannel>(channel: K, listener: Listener<K>): () => void {
        let channelSubscribers = this.subscribers.get(channel);
        if (!channelSubscribers) {
            channelSubscribers = new Set();
            this.subscribers.set(channel, channelSubscribers);
        }
        channelSubscribers.add(listener);

        return () => {
            this.subscribers.get(channel)?.delete(listener);
        };
    }

    public publish<K extends WiggleChannel>(channel: K, payload: WiggleEvents[K]): boolean {
        const channelSubscribers = this.subscribers.get(channel);
        if (!channelSubscribers || channelSubscribers.size === 0) {
            return false;
        }

        // Copy so a listener that unsubscribes mid-dispatch does not skip its neighbours.
        for (const listener of Array.from(channelSubscribers)) {
            listener(payload);
        }
        return true;
    }

    public listenerCount(channel: WiggleChannel): number {
        return this.subscribers.get(channel)?.size ?? 0;
    }
}
