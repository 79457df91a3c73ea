import { createStore } from "zustand/vanilla";
import { TrackError } from "../track.errors";
import type { Trajectory } from "../trajectory/trajectory";

export type TrajectoryLoader = () => Promise<Trajectory>;

type LoadOptions = {
    /** Label of what was loaded (file path, route name) */
    source: string;
    force?: boolean;
};

type TrajectoryStatus = "idle" | "loading" | "ready" | "error";

export type TrajectoryState = {
    trajectory: Trajectory | null;
    source: string | null;
    status: TrajectoryStatus;
    error: string | null;
    loadedAt: number | null;

    // internal: a forced load that arrived while loading runs afterwards
    _pending: { loader: TrajectoryLoader; source: string } | null;

    /** Load once; later calls are no-ops unless `force` is set. */
    load: (loader: TrajectoryLoader, opts: LoadOptions) => Promise<void>;
    /** Explicit reload: always replaces the current trajectory. */
    replace: (loader: TrajectoryLoader, source: string) => Promise<void>;
    reset: () => void;
};

/**
 * Process-scoped "currently loaded trajectory" for consumers such as a display server.
 * Set once at startup, replaced only through `replace` (or `load` with `force`).
 */
export const createTrajectoryStore = () =>
    createStore<TrajectoryState>()((set, get) => ({
        trajectory: null,
        source: null,
        status: "idle",
        error: null,
        loadedAt: null,

        _pending: null,

        reset: () => {
            set({
                trajectory: null,
                source: null,
                status: "idle",
                error: null,
                loadedAt: null,
                _pending: null,
            });
        },

        replace: (loader, source) => get().load(loader, { source, force: true }),

        load: async (loader, opts) => {
            const { source, force = false } = opts;
            const state = get();

            // If already loading, remember a forced request and run it afterwards
            if (state.status === "loading") {
                if (force) set({ _pending: { loader, source } });
                return;
            }

            if (!force && state.status === "ready") return;

            set({ status: "loading", error: null });

            try {
                const trajectory = await loader();
                set({
                    trajectory,
                    source,
                    status: "ready",
                    error: null,
                    loadedAt: Date.now(),
                });
            } catch (e: unknown) {
                const msg = e instanceof Error ? e.message : "Failed to load trajectory";
                set({ status: "error", error: msg });
                throw e;
            } finally {
                const pending = get()._pending;
                if (pending) {
                    set({ _pending: null });
                    await get().load(pending.loader, { source: pending.source, force: true });
                }
            }
        },
    }));

export const trajectoryStore = createTrajectoryStore();

/** The loaded trajectory, or a NOT_LOADED error. */
export function requireTrajectory(store = trajectoryStore): Trajectory {
    const { trajectory, status } = store.getState();
    if (!trajectory) throw new TrackError(`No trajectory loaded (status: ${status})`, "NOT_LOADED");
    return trajectory;
}
