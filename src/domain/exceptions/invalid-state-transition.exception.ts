import { DomainException } from './domain.exception';

/**
 * Thrown when an order is asked to move to a status its current status does not allow.
 */
export class InvalidStateTransitionException extends DomainException {
  constructor(
    public readonly from: string,
    public readonly to: string,
    reason?: string,
  ) {
    super(reason ?? `Cannot transition from ${from} to ${to}`, 'INVALID_STATE_TRANSITION');
  }
}
