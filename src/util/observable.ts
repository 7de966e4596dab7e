import type { Logger } from 'util/log';

export interface Subscription {
    unsubscribe(this: void): void;
}

export interface Observable<T> {
    subscribe(this: void, observer: (value: T) => void): Subscription;
}

export interface Subject<T> extends Observable<T> {
    next(this: void, value: T): void;
    complete(this: void): void;
}

export interface SubjectOptions {
    /** Observer failures are reported here instead of breaking the emit loop */
    readonly logger?: Logger;
    readonly label?: string;
}

export interface StateSubject<T> extends Subject<T> {
    /** Latest value; replayed to every new subscriber */
    value(this: void): T;
}

const NOOP_SUBSCRIPTION: Subscription = {
    unsubscribe: () => undefined,
};

const createObserverSet = <T>(options: SubjectOptions) => {
    const observers = new Set<(value: T) => void>();
    const label = options.label?.trim() || 'anonymous';

    const notify = (observer: (value: T) => void, value: T): void => {
        try {
            observer(value);
        } catch (error) {
            options.logger?.error('Observer failed', {
                subject: label,
                message: error instanceof Error ? error.message : String(error),
            });
        }
    };

    const broadcast = (value: T): void => {
        for (const observer of [...observers]) {
            notify(observer, value);
        }
    };

    return { observers, notify, broadcast };
};

export const createStateSubject = <T>(initial: T, options: SubjectOptions = {}): StateSubject<T> => {
    const { observers, notify, broadcast } = createObserverSet<T>(options);
    let current = initial;
    let isComplete = false;

    return {
        value: () => current,
        subscribe: (observer) => {
            if (isComplete) {
                return NOOP_SUBSCRIPTION;
            }
            observers.add(observer);
            notify(observer, current);
            return {
                unsubscribe: () => {
                    observers.delete(observer);
                },
            };
        },
        next: (value) => {
            if (isComplete) {
                return;
            }
            current = value;
            broadcast(value);
        },
        complete: () => {
            isComplete = true;
            observers.clear();
        },
    };
};
