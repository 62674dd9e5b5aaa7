import { fastFailCheck } from '../../src/evaluation/fast-fail';

describe('fastFailCheck', () => {
  it('should escalate a reply that confirms a refund', () => {
    expect(fastFailCheck('Good news, we have processed your refund of $60.')).toEqual({
      violation: 'confirmed_refund',
      disposition: 'escalate',
    });
  });

  it('should draft a reply that confirms a cancellation', () => {
    expect(fastFailCheck('Your subscription has been cancelled as requested.')).toEqual({
      violation: 'confirmed_cancellation',
      disposition: 'draft',
    });
  });

  it('should draft a reply that confirms a pause', () => {
    expect(fastFailCheck('I have paused your subscription for two months.')?.violation).toBe('confirmed_pause');
  });

  it('should escalate a reply carrying a card number', () => {
    expect(fastFailCheck('The card 4111-1111-1111-1111 was declined.')).toEqual({
      violation: 'card_number_exposed',
      disposition: 'escalate',
    });
  });

  it('should report the first violation in list order', () => {
    expect(fastFailCheck('We cancelled your subscription and issued a refund.')?.violation).toBe('confirmed_refund');
  });

  it('should pass a reply that only mentions a pending request', () => {
    expect(fastFailCheck('Your pause request is awaiting confirmation from our team.')).toBeNull();
  });

  it('should not mistake a tracking number for a card', () => {
    expect(fastFailCheck('Tracking number 1Z999AA10000000001, estimated delivery 2026-10-21.')).toBeNull();
  });
});
