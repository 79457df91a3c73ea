import { createStore } from "zustand/vanilla";

export type FusionConfig = {
    // Copy the imported 10 m wind into each point's wind state (windU/windV)
    useEnvWind: boolean;

    // Grid variables that must exist for a wind import
    requiredVariables: string[];

    // Keys the apparent-wind derivation writes to
    boatKeys: { u: string; v: string };
};

type FusionConfigState = {
    config: FusionConfig;

    setConfig: (partial: Partial<FusionConfig>) => void;
    resetConfig: () => void;
};

export const defaultFusionConfig: FusionConfig = {
    useEnvWind: false,
    requiredVariables: ["u10", "v10"],
    boatKeys: { u: "boat_u", v: "boat_v" },
};

export const fusionConfigStore = createStore<FusionConfigState>()((set) => ({
    config: defaultFusionConfig,

    setConfig: (partial) =>
        set((state) => ({
            config: { ...state.config, ...partial },
        })),

    resetConfig: () =>
        set({
            config: defaultFusionConfig,
        }),
}));

export const getFusionConfig = (): FusionConfig => fusionConfigStore.getState().config;
