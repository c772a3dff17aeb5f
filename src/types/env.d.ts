declare namespace NodeJS {
    interface ProcessEnv {
        STATARB_BASE_CURRENCY?: string;
        STATARB_INTERVAL?: string;
        STATARB_WINDOWS?: string;
        STATARB_NUM_STD?: string;
        STATARB_FEE?: string;
        STATARB_ADF_LEVEL?: string;
        OANDA_API_KEY?: string;
        OANDA_ENVIRONMENT?: string;
        OANDA_TIMEOUT_MS?: string;
    }
}
