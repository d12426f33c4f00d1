import { describe, it, expect, beforeEach } from 'vitest';
import { zeroAddress } from 'viem';
import { OwnershipService } from './ownership-service.js';
import { FactoryEventLog } from '../../events/index.js';
import { AuthorizationError, ValidationError } from '../../errors/index.js';

const OWNER = '0x1000000000000000000000000000000000000001';
const NEW_OWNER = '0x2000000000000000000000000000000000000002';
const STRANGER = '0x3000000000000000000000000000000000000003';

describe('OwnershipService', () => {
  let events: FactoryEventLog;
  let ownership: OwnershipService;

  beforeEach(() => {
    events = new FactoryEventLog();
    ownership = new OwnershipService({ owner: OWNER, events });
  });

  it('should reject a null owner at construction', () => {
    expect(() => new OwnershipService({ owner: zeroAddress })).toThrow(ValidationError);
  });

  it('should only accept the owner', () => {
    expect(() => ownership.assertOwner(OWNER, 'op')).not.toThrow();
    expect(() => ownership.assertOwner(STRANGER, 'op')).toThrow(AuthorizationError);
    expect(() => ownership.assertOwner('garbage', 'op')).toThrow(AuthorizationError);
  });

  it('should transfer ownership and emit an event', () => {
    ownership.transferOwnership(OWNER, NEW_OWNER);

    expect(ownership.owner).toBe(NEW_OWNER);
    expect(ownership.isOwner(OWNER)).toBe(false);
    expect(events.getEventsOfType('OwnershipTransferred')[0]?.event).toEqual({
      type: 'OwnershipTransferred',
      previousOwner: OWNER,
      newOwner: NEW_OWNER,
    });
  });

  it('should refuse transfers from non-owners or to null', () => {
    expect(() => ownership.transferOwnership(STRANGER, NEW_OWNER)).toThrow(AuthorizationError);
    expect(() => ownership.transferOwnership(OWNER, zeroAddress)).toThrow(ValidationError);
    expect(ownership.owner).toBe(OWNER);
  });
});
