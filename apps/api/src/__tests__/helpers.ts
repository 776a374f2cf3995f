import type { MemberRow, MemberTable } from '../types/member';

export const MEMBER_COLUMNS = ['name', 'email', 'join_date', 'last_login', 'attendance_count', 'role'];

export const makeTable = (rows: MemberRow[], columns: string[] = MEMBER_COLUMNS): MemberTable => ({
  columns,
  rows: rows.map(row => {
    const full: MemberRow = {};
    for (const col of columns) full[col] = row[col] ?? null;
    return full;
  })
});

const BASE_PEOPLE = [
  ['Ada Byrne', 'ada.byrne@example.org'],
  ['Bruno Costa', 'bruno.costa@example.org'],
  ['Chiara Russo', 'chiara.russo@example.org'],
  ['Dmitri Volkov', 'dmitri.volkov@example.org'],
  ['Elena Petrova', 'elena.petrova@example.org'],
  ['Farid Nasser', 'farid.nasser@example.org'],
  ['Greta Lind', 'greta.lind@example.org'],
  ['Hiro Tanaka', 'hiro.tanaka@example.org'],
  ['Ines Duarte', 'ines.duarte@example.org'],
  ['Jonas Weber', 'jonas.weber@example.org'],
  ['Kofi Mensah', 'kofi.mensah@example.org'],
  ['Lucia Romero', 'lucia.romero@example.org'],
  ['Mateo Silva', 'mateo.silva@example.org'],
  ['Nadia Karim', 'nadia.karim@example.org'],
  ['Oskar Nilsson', 'oskar.nilsson@example.org'],
  ['Paula Moreno', 'paula.moreno@example.org'],
  ['Quentin Moreau', 'quentin.moreau@example.org'],
  ['Rosa Bianchi', 'rosa.bianchi@example.org'],
  ['Samir Haddad', 'samir.haddad@example.org'],
  ['Tara Quinn', 'tara.quinn@example.org']
];

/**
 * Twenty clean members, then: rows 0 and 1 appended again, two mis-cased names,
 * one " at " email, one US-format and one unknown join date, two missing
 * attendance counts and one missing last login.
 */
export const makeDefectTable = (): MemberTable => {
  const rows: MemberRow[] = BASE_PEOPLE.map(([name, email], i) => ({
    name,
    email,
    join_date: `2023-0${(i % 9) + 1}-1${i % 10}`,
    last_login: '2024-05-01 10:00:00',
    attendance_count: i,
    role: i % 5 === 0 ? 'Admin' : 'Member'
  }));

  rows.push({ ...rows[0] }, { ...rows[1] });
  rows[2].name = 'CHIARA RUSSO';
  rows[3].name = 'dmitri volkov';
  rows[4].email = 'elena.petrova at example.org';
  rows[5].join_date = '05/06/2023';
  rows[6].join_date = 'Unknown';
  rows[7].attendance_count = null;
  rows[8].attendance_count = null;
  rows[9].last_login = null;

  return makeTable(rows);
};
