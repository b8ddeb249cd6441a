import { Injectable, Logger } from '@nestjs/common';
import { CareerService } from '../career/career.service';
import { ValidationFault } from '../common/errors';
import { JobService } from '../job/job.service';
import { ResumeService } from '../resume/resume.service';

export const CHATBOT_TOP_N = 3;
export const DEFAULT_CHATBOT_ROLE = 'Backend Developer';

export interface WebhookRequest {
  intent: string;
  parameters: Record<string, unknown>;
}

export interface FulfillmentResponse {
  fulfillmentResponse: { messages: Array<{ text: { text: string[] } }> };
  fulfillmentText: string;
}

const WELCOME = [
  "Hi! I'm your jobseeker assistant.",
  '',
  'I can help you with:',
  '• Job recommendations: tell me your skills',
  '• Skill gap analysis: share your target role',
  '• Resume feedback: paste your resume text',
  '',
  'What would you like to explore?',
].join('\n');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringAt(source: unknown, ...keys: string[]): string {
  let value: unknown = source;
  for (const key of keys) {
    value = isRecord(value) ? value[key] : undefined;
  }
  return typeof value === 'string' ? value : '';
}

function recordAt(source: unknown, ...keys: string[]): Record<string, unknown> {
  let value: unknown = source;
  for (const key of keys) {
    value = isRecord(value) ? value[key] : undefined;
  }
  return isRecord(value) ? value : {};
}

/** Reads intent and parameters from a Dialogflow ES, Dialogflow CX or direct request body. */
export function parseRequest(body: unknown): WebhookRequest {
  if (isRecord(body) && 'queryResult' in body) {
    return {
      intent: stringAt(body, 'queryResult', 'intent', 'displayName').toLowerCase(),
      parameters: recordAt(body, 'queryResult', 'parameters'),
    };
  }
  if (isRecord(body) && 'intentInfo' in body) {
    return {
      intent: stringAt(body, 'intentInfo', 'displayName').toLowerCase(),
      parameters: recordAt(body, 'sessionInfo', 'parameters'),
    };
  }
  if (isRecord(body) && 'text' in body) {
    return {
      intent: (stringAt(body, 'intent') || 'default.welcome').toLowerCase(),
      parameters: recordAt(body, 'parameters'),
    };
  }
  return { intent: '', parameters: {} };
}

/** Accepts a list or a comma-separated string. */
export function toStringList(value: unknown): string[] {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
  if (Array.isArray(value)) {
    return value.filter((s): s is string => typeof s === 'string');
  }
  return [];
}

export function fulfillment(message: string): FulfillmentResponse {
  return {
    fulfillmentResponse: { messages: [{ text: { text: [message] } }] },
    fulfillmentText: message,
  };
}

@Injectable()
export class ChatbotService {
  private readonly logger = new Logger(ChatbotService.name);

  constructor(
    private readonly jobService: JobService,
    private readonly careerService: CareerService,
    private readonly resumeService: ResumeService,
  ) {}

  handle(body: unknown): FulfillmentResponse {
    const request = parseRequest(body);
    this.logger.log(`Webhook | intent=${request.intent || '-'} | params=${Object.keys(request.parameters).join(',') || '-'}`);

    try {
      return fulfillment(this.dispatch(request));
    } catch (error) {
      if (error instanceof ValidationFault) {
        this.logger.warn(`Webhook ${error.reason}: ${error.message}`);
        return fulfillment(`Sorry, I couldn't do that: ${error.message}`);
      }
      throw error;
    }
  }

  private dispatch({ intent, parameters }: WebhookRequest): string {
    if (intent.includes('recommend') || intent.includes('job')) {
      return this.recommendations(toStringList(parameters.skills));
    }
    if (intent.includes('skill') && intent.includes('gap')) {
      const role = typeof parameters.role === 'string' && parameters.role.trim() ? parameters.role.trim() : DEFAULT_CHATBOT_ROLE;
      return this.skillGap(toStringList(parameters.skills), role);
    }
    if (intent.includes('resume')) {
      return this.resume(typeof parameters.resume_text === 'string' ? parameters.resume_text : '');
    }
    return WELCOME;
  }

  private recommendations(skills: string[]): string {
    const { recommendations } = this.jobService.recommend({ skills, topN: CHATBOT_TOP_N });
    if (!recommendations.length) {
      return "I couldn't find matching jobs. Try adding more skills to your profile!";
    }
    const lines = recommendations.map((r) => `• ${r.title} at ${r.company} (${r.location}): ${r.matchPercent}% match`);
    return `Here are your top job matches:\n\n${lines.join('\n')}\n\nWould you like details on any of these?`;
  }

  private skillGap(skills: string[], role: string): string {
    const report = this.careerService.analyze({ skills, targetRole: role });
    const next = report.prioritizedMissing.slice(0, 5).map((s) => s.skill);
    return [
      `For ${report.role}, you're ${report.completionPercent}% ready!`,
      `Skills to learn next: ${next.length ? next.join(', ') : 'none, you are ready!'}`,
      `Estimated time: ${report.etaWeeks} weeks`,
    ].join('\n\n');
  }

  private resume(resumeText: string): string {
    const result = this.resumeService.scoreText(resumeText);
    const tips = result.tips.slice(0, 2).map((t) => `• ${t.message}`);
    return [
      `Resume score: ${result.overall}/100 (${result.grade})`,
      `Quick improvements:\n${tips.length ? tips.join('\n') : 'Your resume looks good!'}`,
    ].join('\n\n');
  }
}
