import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import {
	ESCROW_CANCELLED_ID,
	ESCROW_COMPLETED_ID,
	ESCROW_CREATED_ID,
	type EscrowCancelledEvent,
	type EscrowCompletedEvent,
	type EscrowCreatedEvent,
} from "./escrow.event";

export type EscrowSse = {
	type: "escrow_created" | "escrow_completed" | "escrow_cancelled";
	eventId: string;
	orderId: string;
	owner: string;
};

export type SseEvent<T = EscrowSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<EscrowSse>();

	escrowEvents(scope: { orderId?: string; owner?: string } = {}) {
		return this.events$.pipe(
			filter(
				(e) =>
					(scope.orderId === undefined || e.orderId === scope.orderId) &&
					(scope.owner === undefined || e.owner === scope.owner),
			),
		);
	}

	@OnEvent(ESCROW_CREATED_ID)
	onEscrowCreated(evt: EscrowCreatedEvent) {
		this.events$.next({
			type: "escrow_created",
			eventId: evt.eventId,
			orderId: evt.orderId,
			owner: evt.owner,
		});
	}

	@OnEvent(ESCROW_COMPLETED_ID)
	onEscrowCompleted(evt: EscrowCompletedEvent) {
		this.events$.next({
			type: "escrow_completed",
			eventId: evt.eventId,
			orderId: evt.orderId,
			owner: evt.owner,
		});
	}

	@OnEvent(ESCROW_CANCELLED_ID)
	onEscrowCancelled(evt: EscrowCancelledEvent) {
		this.events$.next({
			type: "escrow_cancelled",
			eventId: evt.eventId,
			orderId: evt.orderId,
			owner: evt.owner,
		});
	}
}
