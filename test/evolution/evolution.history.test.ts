import {
  exportHistoryCSV,
  exportHistoryJSONL,
  formatAccuracy,
} from '../../src/evolution/evolution.history';
import type { GenerationRecord } from '../../src/evolution/evolution.types';

describe('history exports', () => {
  const history: GenerationRecord[] = [
    {
      generation: 0,
      solved: false,
      best: [0, 0, 0, 0],
      fitness: 3,
      accuracy: 50,
      accuracyText: '50.000%',
    },
    {
      generation: 1,
      solved: true,
      best: [1, 3, 0, 2],
      fitness: 6,
      accuracy: 100,
      accuracyText: '100.000%',
    },
  ];

  test('formatAccuracy keeps three decimals', () => {
    // Act & Assert
    expect(formatAccuracy((200 / 3))).toBe('66.667%');
  });

  test('CSV has a header and one row per record', () => {
    // Act
    const csv = exportHistoryCSV(history);
    // Assert
    expect(csv).toBe(
      [
        'generation,solved,best,fitness,accuracy',
        '0,false,0 0 0 0,3,50.000',
        '1,true,1 3 0 2,6,100.000',
      ].join('\n')
    );
  });

  test('CSV keeps only the most recent records', () => {
    // Act
    const csv = exportHistoryCSV(history, 1);
    // Assert
    expect(csv.split('\n')).toEqual([
      'generation,solved,best,fitness,accuracy',
      '1,true,1 3 0 2,6,100.000',
    ]);
  });

  test('CSV is empty without history', () => {
    // Act & Assert
    expect(exportHistoryCSV([])).toBe('');
  });

  test('JSONL writes one parseable object per line', () => {
    // Act
    const lines = exportHistoryJSONL(history).split('\n');
    // Assert
    expect(lines[0]).toBe(
      '{"generation":0,"solved":false,"best":[0,0,0,0],"fitness":3,"accuracy":50,"accuracyText":"50.000%"}'
    );
    expect(JSON.parse(lines[1])).toEqual(history[1]);
  });
});
