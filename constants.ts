// Canonical field names used throughout the pipeline.
export const FIELD = {
  timestamp: 'Timestamp',
  email: 'Email',
  name: 'Name',
  course: 'Course',
  enrollmentId: 'EnrollmentId',
  priority1: 'Priority 1',
  priority2: 'Priority 2',
  priority3: 'Priority 3',
  availability: 'Availability',
  motivation: 'Motivation',
  motivation2: 'Motivation 2',
  motivation3: 'Motivation 3',
  maxCourses: 'MaxCourses',
  otherFactors: 'OtherFactors',
  sincerity: 'Sincerity',
  prereqCheck: 'PrereqCheck',
  notes: 'Notes',
} as const;

/**
 * Form question text -> canonical field name.
 * Keys must match the exported sheet headers byte for byte, trailing spaces and
 * embedded newlines included.
 */
export const COLUMN_MAP: Readonly<Record<string, string>> = Object.freeze({
  'Carimbo de data/hora': FIELD.timestamp,
  'Endereço de e-mail': FIELD.email,
  'Nome completo': FIELD.name,
  'Curso': FIELD.course,
  'Número de Matrícula': FIELD.enrollmentId,
  '1ª Prioridade: Qual disciplina você mais tem interesse em cursar nas férias?': FIELD.priority1,
  '2ª Prioridade: Qual seria a SEGUNDA disciplina você mais tem interesse em cursar nas férias?': FIELD.priority2,
  '3ª Prioridade: Qual seria a TERCEIRA disciplina você mais tem interesse em cursar nas férias?': FIELD.priority3,
  'No geral, quais turnos você teria disponibilidade para cursar disciplinas de férias de verão?': FIELD.availability,
  // Only the first-choice motivation feeds the detail analysis
  '(1ª Disciplina) Algum dos casos baixo descreve seu interesse em cursar essa disciplina nas férias? Quais?': FIELD.motivation,
  '(2ª Disciplina) Algum dos casos baixo descreve seu interesse em cursar essa disciplina nas férias? Quais?': FIELD.motivation2,
  '(3ª Disciplina) Algum dos casos baixo descreve seu interesse em cursar essa disciplina nas férias? Quais?': FIELD.motivation3,
  'Qual o máximo de matérias que você gostaria de cursar durante o semestre de verão (2025.4)?': FIELD.maxCourses,
  'Há outros fatores que motiva seu interesse em cursar essas disciplinas nas férias? ': FIELD.otherFactors,
  'Seja sincero': FIELD.sincerity,
  'Por favor, consulte sua matriz curricular para garantir que você cumpre os pré-requisitos para cursar a disciplina!': FIELD.prereqCheck,
  'Há mais alguma observação que gostaria de compartilhar?\nOpcional. Ex: "não posso ter aulas em fevereiro", "troquei de matriz e agora tá bem complicado pois..." , "tenho preferencia pelo professor(a) tal, mas dependendo também poderia com tal", "não tenho preferencia por horário e professor, estou desesperado(a)!".\n\nLembre-se: quanto menos restritivo e mais sincero, melhor.': FIELD.notes,
});

export const RANK_FIELDS = [FIELD.priority1, FIELD.priority2, FIELD.priority3] as const;

export const REQUIRED_FIELDS: readonly string[] = [
  FIELD.course,
  FIELD.availability,
  FIELD.motivation,
  FIELD.enrollmentId,
  ...RANK_FIELDS,
];

// Generic answers and form boilerplate that respondents paste into the motivation field
export const MOTIVATION_DENYLIST: readonly string[] = [
  'outros',
  'outro',
  'não tenho interesse',
  'há outros fatores que motiva seu interesse em cursar essas disciplinas nas férias? há mais alguma observação que gostaria de compartilhar?',
  'opcional. ex: "não posso ter aulas em fevereiro", "troquei de matriz e agora tá bem complicado pois..." , "tenho preferencia pelo professor(a) tal, mas dependendo também poderia com tal", "não tenho preferencia por horário e professor, estou desesperado(a)!".',
];

// Cell contents that mean "no choice given"
export const EMPTY_CHOICE_MARKERS: readonly string[] = ['', '-'];

export const ALL_COURSES = 'All courses';

// Option lists sort the same on every host
export const SORT_LOCALE = 'pt-BR';

export const DEFAULT_SHEET_RANGE = 'A:ZZ';
