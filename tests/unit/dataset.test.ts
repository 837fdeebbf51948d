import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DatasetSource } from '../../src/dataset/dataset-source';
import { writeAssignments } from '../../src/dataset/result-writer';
import { runAssignment } from '../../src/routing/assignment-engine';
import { DatasetError } from '../../src/routing/errors';
import { AssignmentRecord } from '../../src/routing/types';

const dataset = {
  agents: [
    {
      agent_id: 'agent_001',
      name: 'Sam Rivera',
      skills: { Networking: 8, VPN_Troubleshooting: 7 },
      current_load: 1,
      availability_status: 'Available',
      experience_level: 9,
    },
    {
      agent_id: 'agent_002',
      name: 'Jo Chen',
      skills: { Printer_Troubleshooting: 9, Hardware_Diagnostics: 6 },
      current_load: 0,
      availability_status: 'Available',
      experience_level: 4,
    },
  ],
  tickets: [
    {
      ticket_id: 'TKT-1',
      title: 'Printer offline',
      description: 'The third floor printer shows a paper jam and will not print.',
      creation_timestamp: 1700000000,
    },
    {
      ticket_id: 'TKT-2',
      title: 'VPN keeps dropping',
      description: 'Remote staff lose the VPN tunnel every few minutes, urgent.',
      creation_timestamp: 1700000100,
    },
  ],
};

describe('dataset I/O', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ticket-assigner-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeDataset(content: string): string {
    const file = path.join(dir, 'dataset.json');
    fs.writeFileSync(file, content);
    return file;
  }

  describe('DatasetSource', () => {
    it('should load agents and tickets', () => {
      const source = new DatasetSource(writeDataset(JSON.stringify(dataset)));
      expect(source.loadAgents().map((a) => a.agent_id)).toEqual(['agent_001', 'agent_002']);
      expect(source.loadTickets().map((t) => t.ticket_id)).toEqual(['TKT-1', 'TKT-2']);
    });

    it('should read the file only once', () => {
      const file = writeDataset(JSON.stringify(dataset));
      const source = new DatasetSource(file);
      const agents = source.loadAgents();
      fs.unlinkSync(file);
      expect(source.loadAgents()).toBe(agents);
      expect(source.loadTickets()).toHaveLength(2);
    });

    it('should fail on a missing file', () => {
      const source = new DatasetSource(path.join(dir, 'missing.json'));
      expect(() => source.loadAgents()).toThrow(DatasetError);
    });

    it('should fail on invalid JSON', () => {
      const source = new DatasetSource(writeDataset('{ "agents": ['));
      expect(() => source.loadTickets()).toThrow(/^Invalid JSON in dataset file/);
    });

    it('should fail when the tickets array is missing', () => {
      const source = new DatasetSource(writeDataset(JSON.stringify({ agents: [] })));
      expect(() => source.loadAgents()).toThrow("must have required property 'tickets'");
    });
  });

  describe('writeAssignments', () => {
    it('should write the assignments document, creating directories', () => {
      const records: AssignmentRecord[] = [
        {
          ticket_id: 'TKT-1',
          title: 'Printer offline',
          priority: 'Low',
          assigned_agent_id: 'agent_002',
          score: 0.61,
          rationale: 'Assigned to Jo Chen (agent_002): strong skill match (0.90) on Printer_Troubleshooting',
        },
      ];
      const file = path.join(dir, 'out', 'nested', 'result.json');

      writeAssignments(file, records);

      expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({ assignments: records });
    });
  });

  it('should run a dataset end to end', () => {
    const source = new DatasetSource(writeDataset(JSON.stringify(dataset)));
    const records = runAssignment(source.loadAgents(), source.loadTickets());
    const file = path.join(dir, 'output_result.json');

    writeAssignments(file, records);
    const written: { assignments: AssignmentRecord[] } = JSON.parse(fs.readFileSync(file, 'utf-8'));

    expect(written.assignments.map((r) => [r.ticket_id, r.assigned_agent_id])).toEqual([
      ['TKT-2', 'agent_001'],
      ['TKT-1', 'agent_002'],
    ]);
  });
});
