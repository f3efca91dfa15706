import { z } from 'zod';
import { ErrorFactory, OrchestrationError } from '../../core/errors';
import { Logger } from '../../core/logging/Logger';
import { OrderOrchestrator } from '../../core/workflow/OrderOrchestrator';
import { OrderRequestSchema } from '../../core/validation';

// -------------------------------------------------------------------------
// Validation Schemas
// -------------------------------------------------------------------------
const OrderIdArgsSchema = z.object({
    orderId: z.string().min(1).max(200),
});

const GetResultSchema = OrderIdArgsSchema.extend({
    wait: z.boolean().optional().default(false),
});

export type ToolResponse = {
    content: Array<{ type: 'text'; text: string }>;
};

export type ToolName = 'place_order' | 'cancel_order' | 'get_order_status' | 'get_order_result';

export interface ToolDefinition {
    name: ToolName;
    description: string;
    inputSchema: {
        type: 'object';
        properties: Record<string, unknown>;
        required?: string[];
    };
}

export const toolDefinitions: ToolDefinition[] = [
    {
        name: 'place_order',
        description: 'Place a drink order and start its payment, preparation and notification workflow',
        inputSchema: {
            type: 'object',
            properties: {
                orderId: { type: 'string', description: 'Unique order id; reusing one is rejected' },
                item: { type: 'string', description: 'Drink name, e.g. "Latte"' },
                size: { type: 'string', enum: ['S', 'M', 'L'], description: 'Drink size' },
            },
            required: ['orderId', 'item', 'size'],
        },
    },
    {
        name: 'cancel_order',
        description: 'Request cancellation; takes effect before the next step starts',
        inputSchema: {
            type: 'object',
            properties: {
                orderId: { type: 'string', description: 'Order to cancel' },
            },
            required: ['orderId'],
        },
    },
    {
        name: 'get_order_status',
        description: 'Current phase, step flags and amount of an order',
        inputSchema: {
            type: 'object',
            properties: {
                orderId: { type: 'string', description: 'Order to inspect' },
            },
            required: ['orderId'],
        },
    },
    {
        name: 'get_order_result',
        description: 'Terminal result of an order (COMPLETED, FAILED or CANCELLED)',
        inputSchema: {
            type: 'object',
            properties: {
                orderId: { type: 'string', description: 'Order to read' },
                wait: { type: 'boolean', description: 'Block until the order finishes', default: false },
            },
            required: ['orderId'],
        },
    },
];

function text(value: string): ToolResponse {
    return { content: [{ type: 'text', text: value }] };
}

/**
 * Tool dispatch for the MCP server, kept apart from the transport so it can
 * be driven directly.
 */
export class OrderToolHandlers {
    constructor(private readonly orchestrator: OrderOrchestrator) { }

    public async handle(name: string, args: unknown): Promise<ToolResponse> {
        try {
            switch (name) {
                case 'place_order': {
                    const request = OrderRequestSchema.parse(args);
                    const handle = await this.orchestrator.start(request);
                    return text(`Order ${handle.orderId} accepted (workflow ${handle.workflowId})`);
                }

                case 'cancel_order': {
                    const { orderId } = OrderIdArgsSchema.parse(args);
                    await this.orchestrator.cancel(orderId);
                    return text(`Cancellation requested for order ${orderId}`);
                }

                case 'get_order_status': {
                    const { orderId } = OrderIdArgsSchema.parse(args);
                    const snapshot = await this.orchestrator.status(orderId);
                    return text(JSON.stringify(snapshot, null, 2));
                }

                case 'get_order_result': {
                    const { orderId, wait } = GetResultSchema.parse(args);
                    const result = wait
                        ? await this.orchestrator.result(orderId)
                        : await this.orchestrator.tryResult(orderId);
                    return text(result ? JSON.stringify(result, null, 2) : `Order ${orderId} is still running`);
                }

                default:
                    throw ErrorFactory.validation(`Unknown tool: ${name}`);
            }
        } catch (err: unknown) {
            if (err instanceof z.ZodError) {
                const issues = err.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
                throw new Error(`Validation Error: ${issues}`);
            }
            Logger.warn('MCP', `Tool ${name} failed`, { error: err instanceof Error ? err.message : String(err) });
            const message = err instanceof OrchestrationError ? err.toUserFriendly() :
                (err instanceof Error ? err.message : String(err));
            throw new Error(`Error executing tool ${name}: ${message}`);
        }
    }
}
