import { connect, connection } from "mongoose";
import { config } from "../config";
import { logger } from "../observability/logging";

export const connectDatabase = async (): Promise<void> => {
    if (connection.readyState !== 0) {
        return;
    }
    const uri = (config.db.url || "").trim();
    if (!uri) {
        throw new Error("DB_URL is not set. Add it to .env or set STORAGE_DRIVER=memory");
    }
    logger.info({ host: uri.replace(/\/\/[^@]*@/, "//***@") }, "[DB] Connecting");
    await connect(uri);
    logger.info("[DB] Database connected");
};

export const disconnectDatabase = async (): Promise<void> => {
    if (connection.readyState === 0) return;
    await connection.close();
};
