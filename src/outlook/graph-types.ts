/**
 * Graph API Type Definitions
 *
 * Shapes of the Microsoft Graph v1.0 responses this client reads. Messages
 * and events are passed through unmodified, so they are typed as opaque
 * field mappings.
 */

/** One message or calendar event as returned by Graph */
export type GraphRecord = Record<string, unknown>;

export interface GraphODataCollection<T> {
  "@odata.context"?: string;
  "@odata.nextLink"?: string;
  "@odata.count"?: number;
  value: T[];
}

/** Graph error envelope, e.g. `{ error: { code, message } }` */
export interface GraphErrorBody {
  message?: string;
  error?: {
    code?: string;
    message?: string;
  };
}
