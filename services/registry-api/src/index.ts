import express from "express";
import pg from "pg";
import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { HmacAuthorizationVerifier } from "../../../libs/auth/authorizationVerifier.js";
import { RegistryHost } from "../../../libs/host/registryHost.js";
import { EventLog } from "../../../libs/events/eventLog.js";
import { EventRelay } from "../../../libs/events/EventRelay.js";
import { PgEventStore } from "../../../libs/events/PgEventStore.js";
import { createEventQueryHandler, createRegistryRpcHandler } from "../../../libs/middleware/rpcHandler.js";

async function main() {
    const config = bootstrap("registry-api");

    let relay: EventRelay | null = null;
    let eventLog = new EventLog();
    let store: PgEventStore | null = null;
    if (config.databaseUrl) {
        const pool = new pg.Pool({ connectionString: config.databaseUrl, max: 5 });
        store = new PgEventStore(pool);
        const tail = await store.tail();
        eventLog = new EventLog(tail);
        logger.info(tail, "Event log seeded from the event store");
    }

    const host = new RegistryHost({
        verifier: new HmacAuthorizationVerifier(config.authSecret, { maxAgeMs: config.proofMaxAgeMs }),
        eventLog,
        onCommit: () => {
            relay?.flush().catch(error => {
                logger.error({ error }, "Event relay flush after commit failed");
            });
        }
    });

    if (store) {
        relay = new EventRelay(host.eventLog, store);
        await relay.flush();
        relay.start(config.relayIntervalMs);
    }

    if (config.mappingOwner) {
        const mapping = host.deployMappingRegistry();
        mapping.initialize(config.mappingOwner);
        logger.info({ address: mapping.address, owner: config.mappingOwner }, "Mapping registry ready");

        if (config.ownershipAdmin) {
            const ownership = host.deployOwnershipRegistry();
            ownership.initialize(config.ownershipAdmin, mapping.address);
            logger.info({ address: ownership.address, admin: config.ownershipAdmin }, "Ownership registry ready");
        }
    }

    const app = express();
    app.use(express.json({ limit: "64kb" }));
    app.post("/registries/:address/:operation", createRegistryRpcHandler(host));
    app.get("/registries/:address/events", createEventQueryHandler(host));
    app.get("/registries", (_req, res) => {
        res.json({
            registries: host.addresses().map(address => ({ address, kind: host.registryKind(address) }))
        });
    });

    const server = app.listen(config.port, () => {
        logger.info({ port: config.port }, "Registry API listening");
    });

    const shutdown = () => {
        relay?.stop();
        server.close(() => {
            const finalFlush = relay ? relay.flush() : Promise.resolve(0);
            finalFlush
                .catch(error => logger.error({ error }, "Final event relay flush failed"))
                .finally(() => process.exit(0));
        });
    };
    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
