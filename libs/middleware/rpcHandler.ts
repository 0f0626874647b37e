import type { Request, Response } from 'express';
import { RegistryError } from '../errors/registryErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { RegistryHost } from '../host/registryHost.js';
import { EventRecord } from '../events/schema.js';
import { RpcRequestSchema } from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';

export type RpcResponseBody =
    | { result: unknown }
    | { events: EventRecord[] }
    | { error: { code: string; message: string; incidentId?: string } };

export interface RpcOutcome {
    status: number;
    body: RpcResponseBody;
}

export interface RpcInput {
    address: string;
    operation: string;
    body: unknown;
}

/**
 * Executes one registry call from an untrusted request body.
 * Registry aborts map to their status code; anything else is sanitized to 500.
 */
export function handleRpc(host: RegistryHost, input: RpcInput): RpcOutcome {
    try {
        const request = validate(RpcRequestSchema, input.body ?? {}, `Rpc:${input.operation}`);
        const call = request.caller === undefined
            ? undefined
            : {
                caller: request.caller,
                ...(request.proof ? { proof: request.proof } : {}),
                ...(request.requestId ? { requestId: request.requestId } : {})
            };

        const result = host.invoke(input.address, input.operation, request.args, call);
        return { status: 200, body: { result } };
    } catch (error) {
        return toErrorOutcome(error, 'Rpc:Handler');
    }
}

/**
 * Reads the event history of one subject on one registry.
 */
export function handleEventQuery(host: RegistryHost, address: string, subject: string | undefined): RpcOutcome {
    try {
        host.registryKind(address);
        const events = subject === undefined
            ? host.eventLog.all().filter(r => r.registry === address)
            : host.eventLog.bySubject(subject, address);
        return { status: 200, body: { events } };
    } catch (error) {
        return toErrorOutcome(error, 'Rpc:EventQuery');
    }
}

function toErrorOutcome(error: unknown, contextLabel: string): RpcOutcome {
    if (error instanceof RegistryError) {
        return {
            status: error.statusCode,
            body: { error: { code: error.code, message: error.message } }
        };
    }
    const sanitized = ErrorSanitizer.sanitize(error, contextLabel);
    return {
        status: 500,
        body: { error: { code: 'INTERNAL', message: sanitized.publicMessage, incidentId: sanitized.incidentId } }
    };
}

/**
 * express binding for `POST /registries/:address/:operation`.
 */
export function createRegistryRpcHandler(host: RegistryHost) {
    return (req: Request<{ address: string; operation: string }>, res: Response): void => {
        const outcome = handleRpc(host, {
            address: req.params.address,
            operation: req.params.operation,
            body: req.body
        });
        res.status(outcome.status).json(outcome.body);
    };
}

/**
 * express binding for `GET /registries/:address/events?subject=`.
 */
export function createEventQueryHandler(host: RegistryHost) {
    return (req: Request<{ address: string }>, res: Response): void => {
        const subject = typeof req.query.subject === 'string' ? req.query.subject : undefined;
        const outcome = handleEventQuery(host, req.params.address, subject);
        res.status(outcome.status).json(outcome.body);
    };
}
