import { Client } from "@opensearch-project/opensearch";
import debug from "debug";

/**
 * Loggers for the OpenSearch connection.
 */
const logger = debug("matcher:opensearch");
const error = debug("error:opensearch");

// ---------------------------------------------------------------------------------
// Connection Configuration
// ---------------------------------------------------------------------------------

/**
 * Hostname of the OpenSearch cluster.
 *
 * @default "localhost"
 * @env ELASTIC_HOST
 */
export const ELASTIC_HOST = process.env.ELASTIC_HOST ?? "localhost";

/**
 * Port of the OpenSearch cluster.
 *
 * @default 9200
 * @env ELASTIC_PORT
 */
export const ELASTIC_PORT =
    Number.parseInt(process.env.ELASTIC_PORT ?? "9200", 10) || 9200;

/**
 * Protocol used to reach the cluster.
 *
 * @default "http"
 * @env ELASTIC_PROTOCOL
 */
export const ELASTIC_PROTOCOL = process.env.ELASTIC_PROTOCOL ?? "http";

/**
 * Whether to enable verbose logging.
 *
 * @default false
 * @env VERBOSE
 */
export const VERBOSE = process.env.VERBOSE === "true";

/**
 * Options for {@link esConnect}.
 */
export type ConnectOptions = {
    /** Cluster hostname */
    host?: string;
    /** Cluster port */
    port?: number;
    /** `http` or `https` */
    protocol?: string;
    /** Basic auth user name */
    username?: string;
    /** Basic auth password */
    password?: string;
    /** Whether to verify the cluster's TLS certificate */
    rejectUnauthorized?: boolean;
    /** Default per-request timeout in milliseconds */
    requestTimeout?: number;
    /** Delay between connection attempts in milliseconds */
    interval?: number;
    /** Give up after this many milliseconds (0 waits indefinitely) */
    timeout?: number;
};

/**
 * Connects to OpenSearch, retrying `ping` until the cluster answers.
 *
 * @param options - Connection settings; unset values fall back to the environment.
 * @returns A connected OpenSearch client.
 * @throws {Error} When the cluster stays unreachable past `timeout` (propagates the last error).
 */
export async function esConnect(options: ConnectOptions = {}): Promise<Client> {
    const {
        host = ELASTIC_HOST,
        port = ELASTIC_PORT,
        protocol = ELASTIC_PROTOCOL,
        username = process.env.ELASTIC_USERNAME,
        password = process.env.ELASTIC_PASSWORD,
        rejectUnauthorized = process.env.ELASTIC_TLS_REJECT_UNAUTHORIZED !==
            "false",
        requestTimeout = 30000,
        interval = 1000,
        timeout = 0,
    } = options;

    const node = `${protocol}://${host}:${port}`;
    const client = new Client({
        node,
        requestTimeout,
        ...(username !== undefined &&
            password !== undefined && { auth: { username, password } }),
        ...(protocol === "https" && { ssl: { rejectUnauthorized } }),
    });

    const startedAt = Date.now();

    for (let attempt = 1; ; attempt++) {
        try {
            await client.ping();
            logger(`connected to ${node}`);
            return client;
        } catch (error_) {
            if (timeout > 0 && Date.now() - startedAt >= timeout) {
                error(`giving up on ${node} after ${attempt} attempts`);
                await client.close();
                throw error_;
            }

            if (VERBOSE)
                logger(
                    `waiting for ${node} (attempt ${attempt}, retry in ${interval}ms)`,
                );

            await new Promise<void>((resolve) => {
                setTimeout(resolve, interval);
            });
        }
    }
}

/**
 * Fails fast when the facility index is missing.
 *
 * @param client - Connected OpenSearch client.
 * @param index - Name of the facility index.
 * @throws {Error} If the index does not exist.
 */
export async function verifyIndex(client: Client, index: string): Promise<void> {
    const response = await client.indices.exists({ index });
    if (response.body !== true) {
        throw new Error(
            `Index '${index}' does not exist. Load the facility dataset before matching.`,
        );
    }
    if (VERBOSE) logger(`index '${index}' is present`);
}
