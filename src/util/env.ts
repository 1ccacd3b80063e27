type Env = NodeJS.ProcessEnv;

export function isTestEnv(env: Env = process.env) {
    // JEST_WORKER_ID is set by Jest; also honor NODE_ENV=test
    return !!(env.JEST_WORKER_ID || env.NODE_ENV === "test");
}

export function isCi(env: Env = process.env) {
    return !!env.CI && env.CI !== "false";
}
