import { DEFAULT_CONFIG } from '../src/config/RcaConfig';
import { TicketPolicy } from '../src/orchestration/TicketPolicy';

describe('TicketPolicy', () => {
  const policy = new TicketPolicy(DEFAULT_CONFIG.ticketing);

  test('ranks severities case-insensitively', () => {
    expect(policy.severityRank('low')).toBe(0);
    expect(policy.severityRank('CRITICAL')).toBe(3);
    expect(policy.severityRank('Sev1')).toBe(-1);
    expect(policy.meetsThreshold('high')).toBe(true);
    expect(policy.meetsThreshold('Medium')).toBe(false);
    expect(policy.meetsThreshold('Sev1')).toBe(false);
  });

  test('requests an escalation and a defect for a severe finding', () => {
    const fields = {
      severity: 'High',
      executive_summary: 'Connection pool exhausted under load',
      root_cause: 'Pool size fixed at 10',
      recommendations: ['Raise pool size', 'Add alert'],
      defect_tickets_needed: 'yes'
    };
    const description = [
      'Severity: High',
      'Issue:\nAPI timeouts',
      'Summary:\nConnection pool exhausted under load',
      'Root cause:\nPool size fixed at 10',
      'Recommendations:\n- Raise pool size\n- Add alert'
    ].join('\n\n');

    expect(policy.decide(fields, 'API timeouts')).toEqual([
      {
        kind: 'escalation',
        summary: '[RCA][High] Connection pool exhausted under load',
        description,
        priority: 'High'
      },
      {
        kind: 'defect',
        summary: '[RCA][Defect] Connection pool exhausted under load',
        description,
        priority: 'High'
      }
    ]);
  });

  test('nothing below the threshold', () => {
    expect(policy.decide({ severity: 'Medium', defect_tickets_needed: true }, 'slow page')).toEqual([]);
  });

  test('nothing without fields or a severity', () => {
    expect(policy.decide(null, 'slow page')).toEqual([]);
    expect(policy.decide({ root_cause: 'unknown' }, 'slow page')).toEqual([]);
    expect(policy.decide({ severity: 3 }, 'slow page')).toEqual([]);
  });

  test('an explicit "no escalation" leaves only the defect', () => {
    const requests = policy.decide({ severity: 'critical', escalation_needed: false, defect_tickets_needed: true }, 'Disk full');

    expect(requests.map((r) => r.kind)).toEqual(['defect']);
    expect(requests[0].summary).toBe('[RCA][Defect] Disk full');
    expect(requests[0].description).toBe('Severity: critical\n\nIssue:\nDisk full');
  });

  test('prefers an explicit priority field', () => {
    const [request] = policy.decide({ severity: 'High', priority: 'P1', title: 'Outage' }, '');

    expect(request.priority).toBe('P1');
    expect(request.summary).toBe('[RCA][High] Outage');
  });

  test('falls back to a generic title and caps long ones', () => {
    const [generic] = policy.decide({ severity: 'High' }, '');
    expect(generic.summary).toBe('[RCA][High] Root cause analysis follow-up');

    const [long] = policy.decide({ severity: 'High', problem_statement: 'x'.repeat(130) }, '');
    expect(long.summary).toBe(`[RCA][High] ${'x'.repeat(117)}...`);
  });
});
