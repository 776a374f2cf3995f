import { toMemberTable } from './ingest/table';
import type { MemberTable } from './types/member';

const sampleRoster = [
  { ID: 'M001', Name: 'wren okafor', Email: 'wren.okafor@example.org', Join_Date: '2024-01-12', Last_Login: '2024-06-01 09:15:00', Event_Attendance: 4, Role: 'Member' },
  { ID: 'M002', Name: 'DESMOND QUILL', Email: 'desmond at example.org', Join_Date: '02/03/2024', Last_Login: '2024-06-03 18:40:00', Event_Attendance: 7, Role: 'Admin' },
  { ID: 'M003', Name: 'Ines  Varela', Email: 'ines@example.org', Join_Date: '11-02-2024', Last_Login: null, Event_Attendance: null, Role: 'Member' },
  { ID: 'M003', Name: 'Ines  Varela', Email: 'ines@example.org', Join_Date: '11-02-2024', Last_Login: null, Event_Attendance: null, Role: 'Member' },
  { ID: 'M004', Name: 'Omar Haddad', Email: 'omar.haddad@example.org', Join_Date: 'Unknown', Last_Login: '2024-05-20 12:00:00', Event_Attendance: 2, Role: 'Guest' },
  { ID: 'M005', Name: 'Omar Hadad', Email: 'omarhaddad@example.org', Join_Date: '2024-01-12', Last_Login: '2024-05-21 08:30:00', Event_Attendance: 1, Role: 'Guest' },
  { ID: 'M006', Name: 'priya nair', Email: 'not-an-email', Join_Date: '2023-11-30', Last_Login: '2024-04-11 16:05:00', Event_Attendance: 12, Role: 'Member' },
  { ID: 'M007', Name: 'Tomas Varga', Email: 'Tomas.Varga@Example.org', Join_Date: '2024-01-12', Last_Login: '2024-06-02 07:45:00', Event_Attendance: null, Role: 'Member' }
];

export const loadSampleTable = (): MemberTable => toMemberTable(sampleRoster);
