/** On-disk shape of the attendance queue when a storage path is configured. */
export interface AttendanceState {
  guilds: Record<string, string[]>;
}

export const defaultAttendanceState: AttendanceState = {
  guilds: {}
};
