/**
 * Maker-checker state machine for payments.
 *
 * Every legal move is a row in TRANSITIONS; anything else is rejected by a
 * single lookup. Human actions name the role that may perform them: the
 * creator (maker) submits, any other user (checker) approves or rejects.
 * Execution progress is driven by the system on behalf of the execution
 * provider.
 */

import {
  ActorNotPermittedError,
  InvalidTransitionError,
  SelfApprovalForbiddenError
} from './errors.js';
import type { Payment, PaymentStatus } from './payment.js';

export const HUMAN_PAYMENT_ACTIONS = ['submit', 'approve', 'reject'] as const;
export const SYSTEM_PAYMENT_ACTIONS = ['dispatch', 'start_processing', 'complete', 'fail'] as const;

export type HumanPaymentAction = (typeof HUMAN_PAYMENT_ACTIONS)[number];
export type SystemPaymentAction = (typeof SYSTEM_PAYMENT_ACTIONS)[number];
export type PaymentAction = HumanPaymentAction | SystemPaymentAction;

export type Actor = { kind: 'user'; userId: string } | { kind: 'system'; name: string };

type ActorRole = 'creator' | 'checker' | 'system';

interface TransitionRule {
  to: PaymentStatus;
  actor: ActorRole;
}

export const TRANSITIONS: Readonly<Record<PaymentStatus, Partial<Record<PaymentAction, TransitionRule>>>> = {
  draft: {
    submit: { to: 'pending_approval', actor: 'creator' }
  },
  pending_approval: {
    approve: { to: 'approved', actor: 'checker' },
    reject: { to: 'rejected', actor: 'checker' }
  },
  approved: {
    dispatch: { to: 'submitted', actor: 'system' }
  },
  submitted: {
    start_processing: { to: 'processing', actor: 'system' }
  },
  processing: {
    complete: { to: 'completed', actor: 'system' },
    fail: { to: 'failed', actor: 'system' }
  },
  rejected: {},
  completed: {},
  failed: {}
};

export interface PlannedTransition {
  action: PaymentAction;
  from: PaymentStatus;
  to: PaymentStatus;
  actorId: string;
}

export interface ApprovalEvent {
  eventId: string;
  paymentId: string;
  actorId: string;
  action: PaymentAction;
  fromStatus: PaymentStatus;
  toStatus: PaymentStatus;
  comment: string | null;
  createdAt: Date;
}

export function actorId(actor: Actor): string {
  return actor.kind === 'user' ? actor.userId : `system:${actor.name}`;
}

export function userActor(userId: string): Actor {
  return { kind: 'user', userId };
}

export function systemActor(name: string): Actor {
  return { kind: 'system', name };
}

function isChecker(action: PaymentAction): boolean {
  return action === 'approve' || action === 'reject';
}

function actorMatchesRole(role: ActorRole, actor: Actor, payment: Pick<Payment, 'createdBy'>): boolean {
  switch (role) {
    case 'creator':
      return actor.kind === 'user' && actor.userId === payment.createdBy;
    case 'checker':
      return actor.kind === 'user' && actor.userId !== payment.createdBy;
    case 'system':
      return actor.kind === 'system';
  }
}

/**
 * Decide a transition without mutating anything.
 *
 * Self-approval is checked before the state lookup so a creator approving
 * their own payment is always refused with the same error, whatever the
 * payment's status.
 */
export function planTransition(
  payment: Pick<Payment, 'paymentId' | 'status' | 'createdBy'>,
  action: PaymentAction,
  actor: Actor
): PlannedTransition {
  const id = actorId(actor);

  if (isChecker(action) && actor.kind === 'user' && actor.userId === payment.createdBy) {
    throw new SelfApprovalForbiddenError(payment.paymentId, id);
  }

  const rule = TRANSITIONS[payment.status][action];
  if (!rule) {
    throw new InvalidTransitionError(payment.status, action);
  }

  if (!actorMatchesRole(rule.actor, actor, payment)) {
    throw new ActorNotPermittedError(action, id);
  }

  return { action, from: payment.status, to: rule.to, actorId: id };
}

export function allowedActions(status: PaymentStatus): PaymentAction[] {
  return Object.keys(TRANSITIONS[status]).filter((action): action is PaymentAction =>
    (HUMAN_PAYMENT_ACTIONS as readonly string[]).includes(action) ||
    (SYSTEM_PAYMENT_ACTIONS as readonly string[]).includes(action)
  );
}
