import { coerceValue, parseOptionalInt, parseSort, parseWhere } from './cli-options';
import { UnknownColumnError } from './engine/errors';
import { CriteriaQueryBuilder } from './query/criteria';
import { EMPLOYEE_SCHEMA } from './profiles/employees/schema';

describe('coerceValue', () => {
  it('turns numeric column values into numbers', () => {
    expect(coerceValue(EMPLOYEE_SCHEMA, 'age', '34')).toBe(34);
    expect(coerceValue(EMPLOYEE_SCHEMA, 'salary', '85000.5')).toBe(85000.5);
  });

  it('keeps text column values as they are', () => {
    expect(coerceValue(EMPLOYEE_SCHEMA, 'city', '42')).toBe('42');
  });

  it('rejects an empty value for a numeric column', () => {
    expect(() => coerceValue(EMPLOYEE_SCHEMA, 'age', '')).toThrow(
      'Invalid --where value "" for age: expected a number'
    );
    expect(() => coerceValue(EMPLOYEE_SCHEMA, 'salary', '  ')).toThrow(
      'Invalid --where value "  " for salary: expected a number'
    );
  });

  it('rejects non-numeric text for a numeric column', () => {
    expect(() => coerceValue(EMPLOYEE_SCHEMA, 'age', 'old')).toThrow(
      'Invalid --where value "old" for age: expected a number'
    );
  });
});

describe('parseWhere', () => {
  it('builds equality and membership criteria', () => {
    expect(parseWhere(EMPLOYEE_SCHEMA, ['department=Engineering', 'city=Boston, Denver', 'age=34'])).toEqual({
      department: 'Engineering',
      city: ['Boston', 'Denver'],
      age: 34,
    });
  });

  it('rejects an entry without a column', () => {
    expect(() => parseWhere(EMPLOYEE_SCHEMA, ['=Boston'])).toThrow('Invalid --where "=Boston": expected column=value');
  });

  it('rejects an empty numeric value', () => {
    expect(() => parseWhere(EMPLOYEE_SCHEMA, ['age='])).toThrow('Invalid --where value "" for age: expected a number');
  });

  it('keeps a __proto__ column so the query builder rejects it', () => {
    const criteria = parseWhere(EMPLOYEE_SCHEMA, ['__proto__=x']);

    expect(Object.keys(criteria)).toEqual(['__proto__']);
    expect(() => new CriteriaQueryBuilder('employees', EMPLOYEE_SCHEMA).compile(criteria)).toThrow(UnknownColumnError);
  });
});

describe('parseSort', () => {
  it('defaults to ascending', () => {
    expect(parseSort('salary')).toEqual({ column: 'salary', direction: 'asc' });
    expect(parseSort('salary:desc')).toEqual({ column: 'salary', direction: 'desc' });
  });

  it('rejects an unknown direction', () => {
    expect(() => parseSort('salary:down')).toThrow('Invalid --sort direction "down": expected asc or desc');
  });
});

describe('parseOptionalInt', () => {
  it('parses integers and ignores anything else', () => {
    expect(parseOptionalInt('500')).toBe(500);
    expect(parseOptionalInt('many')).toBeUndefined();
    expect(parseOptionalInt(undefined)).toBeUndefined();
  });
});
