export type LogFields = Record<string, unknown>;

export interface ChunkingLogger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
}

export const consoleChunkingLogger: ChunkingLogger = {
    debug(message, fields) {
        console.debug(message, fields ?? {});
    },
    info(message, fields) {
        console.log(message, fields ?? {});
    },
    warn(message, fields) {
        console.warn(message, fields ?? {});
    },
};

export const silentChunkingLogger: ChunkingLogger = {
    debug() {},
    info() {},
    warn() {},
};
