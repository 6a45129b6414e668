export type PipelineState =
    | { status: "uninitialized" }
    | { status: "ready"; collection: string; chunkCount: number };

export const UNINITIALIZED: PipelineState = { status: "uninitialized" };
