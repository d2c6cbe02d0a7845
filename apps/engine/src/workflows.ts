import { activity, ActivityContext, ApplicationFailure, workflow, WorkflowContext } from '@keel/sdk';

// Example workflows for local dev: KEEL_WORKFLOWS=apps/engine/src/workflows.ts

interface Order {
    orderId: string;
    amount: number;
}

export const reserveStock = activity('reserve-stock', async (order: Order) => {
    return { reservationId: `res-${order.orderId}` };
});

export const chargeCard = activity('charge-card', async (order: Order, ctx: ActivityContext) => {
    if (order.amount <= 0) {
        throw ApplicationFailure.nonRetryable(`invalid amount ${order.amount}`, 'InvalidAmount');
    }
    ctx.heartbeat();
    return { chargeId: `ch-${order.orderId}-${ctx.info.attempt}` };
}, {
    startToCloseTimeoutMs: 10_000,
    retry: { maximumAttempts: 5, nonRetryableErrorTypes: ['InvalidAmount'] },
});

export const fulfilOrder = workflow('fulfil-order', async (ctx: WorkflowContext<Order>) => {
    const reservation = await ctx.activity(reserveStock, ctx.input);
    const charge = await ctx.activity(chargeCard, ctx.input);
    await ctx.sleep(1000);
    return { orderId: ctx.input.orderId, reservation: reservation.reservationId, charge: charge.chargeId };
});
