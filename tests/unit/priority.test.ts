import {
  effectivePriority,
  inferPriority,
  isUrgent,
  priorityRank,
  TICKET_PRIORITIES,
  urgencyPoints,
} from '../../src/routing/priority';

describe('priority', () => {
  describe('inferPriority', () => {
    it('should default to Low without urgency terms', () => {
      expect(inferPriority('Printer queue paper jam')).toBe('Low');
    });

    it('should count medium urgency terms once each', () => {
      expect(urgencyPoints('Error opening report')).toBe(2);
      expect(inferPriority('Error opening report')).toBe('Medium');
      expect(inferPriority('Laptop will not boot')).toBe('High');
    });

    it('should reach Critical on several high urgency terms', () => {
      expect(urgencyPoints('Production database down, urgent')).toBe(5);
      expect(inferPriority('Production database down, urgent')).toBe('Critical');
    });

    it('should match hyphenated phrases', () => {
      expect(urgencyPoints('business-critical outage')).toBe(5);
    });

    it('should match whole words only', () => {
      expect(urgencyPoints('Download a new driver')).toBe(1);
    });
  });

  describe('effectivePriority', () => {
    it('should keep an explicit priority', () => {
      expect(effectivePriority({ ticket_id: 'T-1', title: 'Production outage', description: '', priority: 'Low' })).toBe('Low');
    });

    it('should infer a missing priority from title and description', () => {
      expect(effectivePriority({ ticket_id: 'T-1', title: 'Phishing email', description: 'Suspicious link' })).toBe('High');
    });
  });

  it('should rank priorities from Low to Critical', () => {
    expect(TICKET_PRIORITIES).toEqual(['Low', 'Medium', 'High', 'Critical']);
    expect(TICKET_PRIORITIES.map(priorityRank)).toEqual([0, 1, 2, 3]);
  });

  it('should treat High and Critical as urgent', () => {
    expect(isUrgent('Critical')).toBe(true);
    expect(isUrgent('High')).toBe(true);
    expect(isUrgent('Medium')).toBe(false);
  });
});
