import { describe, it, expect } from 'vitest';
import { getTableName } from 'drizzle-orm';
import {
  orgs,
  locations,
  events,
  users,
  eventInstances,
  attendance,
  attendanceTypes,
  attendanceXAttendanceTypes,
  type NewEventInstance,
  type NewUser,
} from '../src/schema';

describe('Database Schema', () => {
  describe('Table names', () => {
    it('should map to the public schema tables', () => {
      expect(getTableName(orgs)).toBe('orgs');
      expect(getTableName(locations)).toBe('locations');
      expect(getTableName(events)).toBe('events');
      expect(getTableName(users)).toBe('users');
      expect(getTableName(eventInstances)).toBe('event_instances');
      expect(getTableName(attendance)).toBe('attendance');
      expect(getTableName(attendanceTypes)).toBe('attendance_types');
      expect(getTableName(attendanceXAttendanceTypes)).toBe('attendance_x_attendance_types');
    });
  });

  describe('Event instances', () => {
    it('should use snake_case column names', () => {
      expect(eventInstances.orgId.name).toBe('org_id');
      expect(eventInstances.seriesId.name).toBe('series_id');
      expect(eventInstances.startDate.name).toBe('start_date');
      expect(eventInstances.startTime.name).toBe('start_time');
      expect(eventInstances.paxCount.name).toBe('pax_count');
    });

    it('should only require org, date and name', () => {
      expect(eventInstances.orgId.notNull).toBe(true);
      expect(eventInstances.startDate.notNull).toBe(true);
      expect(eventInstances.name.notNull).toBe(true);
      expect(eventInstances.locationId.notNull).toBe(false);
      expect(eventInstances.seriesId.notNull).toBe(false);
      expect(eventInstances.startTime.notNull).toBe(false);
    });

    it('should accept a typed insert record', () => {
      const record: NewEventInstance = {
        orgId: 10,
        locationId: 20,
        seriesId: null,
        startDate: '2024-03-05',
        startTime: '0530',
        name: 'The Grinder',
        paxCount: 12,
      };
      expect(record.startDate).toBe('2024-03-05');
    });
  });

  describe('Users', () => {
    it('should key upserts on a unique email', () => {
      expect(users.email.isUnique).toBe(true);
      expect(users.email.notNull).toBe(true);
    });

    it('should accept a typed insert record', () => {
      const record: NewUser = { f3Name: 'Slingshot', email: 'slingshot@example.com', homeRegionId: 7 };
      expect(record.email).toBe('slingshot@example.com');
    });
  });

  describe('Attendance', () => {
    it('should reference event instances and users', () => {
      expect(attendance.eventInstanceId.name).toBe('event_instance_id');
      expect(attendance.userId.name).toBe('user_id');
      expect(attendance.isPlanned.default).toBe(false);
      expect(attendanceXAttendanceTypes.attendanceId.name).toBe('attendance_id');
      expect(attendanceXAttendanceTypes.attendanceTypeId.name).toBe('attendance_type_id');
    });
  });
});
