export { getSupabase, type SupabaseEnv } from "./client.js";
export { FileArtifactStore, SupabaseArtifactStore, type StorageBucket } from "./artifactStore.js";
