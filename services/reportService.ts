import { ALL_COURSES } from '../constants';
import {
  ProcessedSurvey,
  ReportSection,
  SectionStatus,
  SurveyReport,
  SurveySummary,
} from '../types';
import {
  availabilityDistribution,
  choiceTotals,
  courseOptions,
  demandByChoice,
  filterByChoice,
  filterByCourse,
  motivationDistribution,
  topicOptions,
} from './aggregation';

export interface ReportOptions {
  course?: string;
  topic?: string;
}

const section = <T>(rows: T[], emptyNotice: string): ReportSection<T> =>
  rows.length > 0
    ? { status: SectionStatus.READY, rows }
    : { status: SectionStatus.EMPTY, rows, notice: emptyNotice };

/**
 * Build every aggregate for the current filter selection. Nothing here is cached:
 * percentages always refer to the filtered rows.
 */
export const buildSurveyReport = (survey: ProcessedSurvey, options: ReportOptions = {}): SurveyReport => {
  const course = options.course ?? ALL_COURSES;
  const courseRows = filterByCourse(survey.long, course);

  const summary: SurveySummary = {
    respondents: survey.normalized.rows.length,
    manifestations: courseRows.length,
    topics: topicOptions(courseRows).length,
    courses: courseOptions(survey.normalized).length - 1,
  };

  const demandNotice = course === ALL_COURSES ? 'No course choices in the data.' : `No data for the selected course: ${course}`;
  const demand = section(demandByChoice(courseRows), demandNotice);

  // Detail sections follow the topic selection over every course
  const topic = options.topic ?? topicOptions(survey.long)[0] ?? null;
  if (topic === null) {
    const notice = 'No topics found in the data.';
    return {
      filter: { course, topic },
      summary,
      demand,
      totals: choiceTotals(courseRows),
      availability: section([], notice),
      motivation: section([], notice),
    };
  }

  const detailRows = filterByChoice(survey.long, topic);
  return {
    filter: { course, topic },
    summary,
    demand,
    totals: choiceTotals(courseRows),
    availability: section(
      availabilityDistribution(detailRows),
      detailRows.length === 0 ? `No details for topic: ${topic}` : `No availability recorded for ${topic}.`
    ),
    motivation: section(
      motivationDistribution(detailRows),
      detailRows.length === 0
        ? `No details for topic: ${topic}`
        : `No valid motivations (excluding generic answers) for ${topic}.`
    ),
  };
};
