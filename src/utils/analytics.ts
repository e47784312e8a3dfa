import * as amplitude from '@amplitude/analytics-browser';
import type { RejectionReason } from './navigation';
import type { OverallResult } from './scoring';

/**
 * Analytics utility for tracking assessment activity
 * Sends events to both Amplitude and Google Analytics (gtag)
 */

export interface EventProperties {
  [key: string]: string | number | boolean | undefined;
}

type Gtag = (...args: unknown[]) => void;

const getGtag = (): Gtag | undefined => {
  if (typeof window === 'undefined') return undefined;
  return (window as unknown as { gtag?: Gtag }).gtag;
};

export const initAnalytics = (apiKey: string | undefined): void => {
  if (!apiKey) return;
  amplitude.init(apiKey, undefined, { defaultTracking: true });
};

/**
 * Track a custom event
 */
export const trackEvent = (eventName: string, properties?: EventProperties): void => {
  amplitude.logEvent(eventName, properties);

  const gtag = getGtag();
  if (gtag) {
    gtag('event', eventName, properties);
  }
};

/**
 * Track button click events
 */
export const trackButtonClick = (buttonName: string, properties?: EventProperties): void => {
  trackEvent('button_click', {
    button_name: buttonName,
    ...properties
  });
};

export const trackAnswer = (categoryIndex: number, questionIndex: number, weight: number): void => {
  trackEvent('answer_recorded', {
    category_index: categoryIndex,
    question_index: questionIndex,
    risk_weight: weight
  });
};

/**
 * Track a step change; rejected moves are logged with the gate that blocked them
 */
export const trackNavigation = (
  direction: 'next' | 'previous',
  fromIndex: number,
  rejection?: RejectionReason
): void => {
  if (rejection) {
    trackEvent('navigation_rejected', { direction, from_index: fromIndex, reason: rejection });
    return;
  }
  trackEvent(`navigation_${direction}`, { from_index: fromIndex });
};

export const trackAssessmentCompleted = (result: OverallResult): void => {
  trackEvent('assessment_completed', {
    mode: result.mode,
    level: result.level,
    percentage: Math.round(result.percentage * 10) / 10
  });
};

export const trackRestart = (answeredCount: number, wasComplete: boolean): void => {
  trackEvent('assessment_restarted', {
    answered_count: answeredCount,
    was_complete: wasComplete
  });
};
