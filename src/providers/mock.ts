import type { EventIdIssuer, EventRequest } from './calendar.js';

/**
 * Deterministic issuer for tests.
 *
 * - Ids are `<prefix>1`, `<prefix>2`, ...
 * - Every request is kept in `requests`, in order.
 */
export class MockEventIdIssuer implements EventIdIssuer {
  readonly requests: EventRequest[] = [];
  private seq = 0;

  constructor(private prefix = 'evt_mock_') {}

  issue(request: EventRequest): string {
    this.requests.push(request);
    this.seq++;
    return `${this.prefix}${this.seq}`;
  }
}
