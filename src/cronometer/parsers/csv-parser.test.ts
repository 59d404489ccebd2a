import { describe, it, expect } from 'vitest';
import {
  parseBiometrics,
  parseDailyNutrition,
  parseExercises,
  parseNotes,
  parseNumber,
  parseServings,
  readRows
} from './csv-parser.js';

describe('readRows', () => {
  it('keys cells by header', () => {
    expect(readRows('Day,Note\n2024-01-01,hello\n')).toEqual([{ Day: '2024-01-01', Note: 'hello' }]);
  });

  it('handles quoted fields with commas and a BOM', () => {
    const rows = readRows('\uFEFFDay,Food Name\n2024-01-01,"Oats, rolled"\n');
    expect(rows).toEqual([{ Day: '2024-01-01', 'Food Name': 'Oats, rolled' }]);
  });

  it('reads quotes inside unquoted cells as text', () => {
    expect(readRows('Day,Food Name\n2024-01-01,12" Sub\n')).toEqual([{ Day: '2024-01-01', 'Food Name': '12" Sub' }]);
  });

  it('fills missing trailing cells with empty strings', () => {
    expect(readRows('Day,Note\n2024-01-01\n')).toEqual([{ Day: '2024-01-01', Note: '' }]);
  });

  it('returns no rows for empty input', () => {
    expect(readRows('')).toEqual([]);
    expect(readRows('Day,Note\n')).toEqual([]);
  });
});

describe('parseNumber', () => {
  it('parses numeric cells', () => {
    expect(parseNumber('12.5')).toBe(12.5);
  });

  it('falls back for blank or non-numeric cells', () => {
    expect(parseNumber('')).toBe(0);
    expect(parseNumber('  ')).toBe(0);
    expect(parseNumber('n/a', -1)).toBe(-1);
  });
});

describe('parseServings', () => {
  const csv = [
    'Day,Time,Group,Food Name,Amount,Energy (kcal),Protein (g),Carbs (g),Fat (g),Fiber (g),Sugars (g),Sodium (mg),Cholesterol (mg),Saturated (g)',
    '2024-01-01,8:05,Breakfast,"Oats, rolled",1 cup,300,10.5,54,5,8,1,2,0,1',
    '2024-01-01,,Lunch,Apple,1 medium,95,,25,0.3,4.4,19,2,0,0.1'
  ].join('\n');

  it('maps columns to servings', () => {
    const [oats, apple] = parseServings(csv);

    expect(oats).toMatchObject({
      date: '2024-01-01',
      time: '08:05',
      foodName: 'Oats, rolled',
      servingSize: '1 cup',
      calories: 300,
      proteinG: 10.5,
      carbsG: 54,
      fatG: 5,
      fiberG: 8,
      sugarG: 1,
      sodiumMg: 2,
      cholesterolMg: 0,
      saturatedFatG: 1,
      group: 'Breakfast'
    });
    expect(apple?.time).toBeNull();
    expect(apple?.proteinG).toBe(0);
  });

  it('keeps the original row', () => {
    expect(parseServings(csv)[1]?.raw['Food Name']).toBe('Apple');
  });

  it('accepts the alternate column names', () => {
    const [serving] = parseServings('Date,Name,Serving,Calories,Food Group\n2024-02-03,Egg,1 large,72,Protein\n');
    expect(serving).toMatchObject({
      date: '2024-02-03',
      foodName: 'Egg',
      servingSize: '1 large',
      calories: 72,
      group: 'Protein'
    });
  });

  it('skips rows without a valid date', () => {
    const servings = parseServings('Day,Food Name\n,Ghost\nTotals,All\n2024-01-02,Tea\n');
    expect(servings.map(s => s.foodName)).toEqual(['Tea']);
  });

  it('returns an empty list for a header-only export', () => {
    expect(parseServings('Day,Food Name\n')).toEqual([]);
  });
});

describe('parseDailyNutrition', () => {
  it('maps one record per day', () => {
    const result = parseDailyNutrition(
      'Date,Energy (kcal),Protein (g),Carbs (g),Fat (g),Fiber (g),Sugars (g),Sodium (mg)\n' +
        '2024-01-01,2100,120,250,70,30,60,2300\n'
    );
    expect(result).toHaveLength(1);
    expect(result[0]).toMatchObject({
      date: '2024-01-01',
      calories: 2100,
      proteinG: 120,
      carbsG: 250,
      fatG: 70,
      fiberG: 30,
      sugarG: 60,
      sodiumMg: 2300
    });
  });
});

describe('parseBiometrics', () => {
  it('maps metric, value and unit', () => {
    const [entry] = parseBiometrics('Day,Time,Metric,Unit,Amount\n2024-01-01,07:30,Weight,kg,70.2\n');
    expect(entry).toMatchObject({ date: '2024-01-01', time: '07:30', metric: 'Weight', unit: 'kg', value: 70.2 });
  });

  it('rejects out-of-range times', () => {
    const [entry] = parseBiometrics('Day,Time,Metric,Amount\n2024-01-01,25:00,Weight,70\n');
    expect(entry?.time).toBeNull();
  });
});

describe('parseNotes', () => {
  it('maps note content', () => {
    const [note] = parseNotes('Day,Note\n2024-01-01,"Slept badly, line two"\n');
    expect(note).toMatchObject({ date: '2024-01-01', time: null, content: 'Slept badly, line two' });
  });

  it('keeps quotes in unquoted notes', () => {
    expect(parseNotes('Day,Note\n2024-01-01,said "hi"\n')[0]?.content).toBe('said "hi"');
  });
});

describe('parseExercises', () => {
  it('maps exercise name, duration and calories', () => {
    const [exercise] = parseExercises('Day,Time,Exercise,Minutes,Calories Burned\n2024-01-01,18:00,Running,30,-320\n');
    expect(exercise).toMatchObject({
      date: '2024-01-01',
      time: '18:00',
      name: 'Running',
      durationMinutes: 30,
      caloriesBurned: -320
    });
  });
});
