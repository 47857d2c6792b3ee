// Runtime settings sourced from environment variables
import 'dotenv/config';

export const logLevel: string = process.env.LOG_LEVEL || 'info';
export const logDir: string = process.env.LOG_DIR || '';
export const nodeIdentifier: string = process.env.NODE_ID || `${process.pid}`;
export const mongoUrl: string = process.env.MONGO_URL || 'mongodb://localhost:27017';
export const mongoDb: string = process.env.MONGO_DB || 'exchange';
// Flush committed state to MongoDB after every top-level call
export const persistState: boolean = process.env.PERSIST_STATE === 'true';

export default {
    logLevel,
    logDir,
    nodeIdentifier,
    mongoUrl,
    mongoDb,
    persistState,
};
