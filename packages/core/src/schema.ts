/**
 * Field names used by warning and GSR records
 */
export const JSONField = {
  WARNING_ID: 'Warning_ID',
  EVENT_ID: 'Event_ID',
  EVENT_TYPE: 'Event_Type',
  COUNTRY: 'Country',
  STATE: 'State',
  CITY: 'City',
  EVENT_DATE: 'Event_Date',
  CASE_COUNT: 'Case_Count',
  LATITUDE: 'Latitude',
  LONGITUDE: 'Longitude',
  APPROXIMATE_LOCATION: 'Approximate_Location',
  ACTOR: 'Actor',
  SUBTYPE: 'Event_Subtype',
} as const;

export type JSONFieldName = (typeof JSONField)[keyof typeof JSONField];

/**
 * Event categories
 */
export const EventType = {
  CIVIL_UNREST: 'Civil Unrest',
  DISEASE: 'Disease',
  MILITARY_ACTIVITY: 'Military Activity',
} as const;

export type EventTypeName = (typeof EventType)[keyof typeof EventType];

/**
 * Military Activity subtypes
 */
export const Subtype = {
  CONFLICT: 'Conflict',
  FORCE_POSTURE: 'Force Posture',
} as const;

/**
 * GSR actor value that matches any legitimate warning actor
 */
export const UNSPECIFIED_ACTOR = 'Unspecified';

/**
 * Location names with a preset scope (see locations.ts)
 */
export const LocationName = {
  EGYPT: 'Egypt',
  JORDAN: 'Jordan',
  SAUDI_ARABIA: 'Saudi Arabia',
  TAHRIR: 'Tahrir',
  AMMAN: 'Amman',
  IRBID: 'Irbid',
  MADABA: 'Madaba',
} as const;

export type LocationNameValue = (typeof LocationName)[keyof typeof LocationName];
