export { type BuiltServer, buildServer, upstreamStatus } from "./build-server"
export { type RunOptions, run } from "./run"
