import type { RowParser } from '../fields';
import { zodRowParser } from '../fields';
import { EmployeeRecordSchema, type EmployeeRecord } from './schema';

export const parseEmployee: RowParser<EmployeeRecord> = zodRowParser(EmployeeRecordSchema);
