/**
 * Calendar writes gated on a fresh two-key confirmation.
 *
 * GatedCalendarWriter refuses a write unless `confirmedAt` is not in the
 * future and is younger than TWO_KEY_FRESHNESS_MS, measured when the write
 * is attempted.
 */

import { z } from "zod";
import { confirmationFreshness } from "../approval/two-key.js";
import type { EvidenceChain } from "../audit/store.js";
import { GovernanceError } from "../kernel/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";

export const CalendarEventSchema = z
  .object({
    title: z.string().min(1).max(200),
    startsAt: z.string().datetime(),
    endsAt: z.string().datetime(),
    location: z.string().max(200).optional(),
    notes: z.string().max(2000).optional(),
    attendees: z.array(z.string().email()).max(50).default([]),
  })
  .strict()
  .refine((e) => Date.parse(e.endsAt) > Date.parse(e.startsAt), {
    message: "endsAt must be after startsAt",
    path: ["endsAt"],
  });

export type CalendarEvent = z.infer<typeof CalendarEventSchema>;
export type CalendarEventInput = z.input<typeof CalendarEventSchema>;

export interface CalendarWriteResult {
  eventId: string;
}

/** The calendar backend. Implementations perform the actual write. */
export interface CalendarWriteService {
  createEvent(payload: CalendarEvent, confirmedAt: Date): Promise<CalendarWriteResult>;
}

export class GatedCalendarWriter {
  constructor(
    private readonly service: CalendarWriteService,
    private readonly evidence: EvidenceChain,
    private readonly clock: () => Date = () => new Date(),
    private readonly logger: Logger = silentLogger(),
  ) {}

  async createEvent(input: CalendarEventInput, confirmedAt: Date): Promise<CalendarWriteResult> {
    const parsed = CalendarEventSchema.safeParse(input);
    if (!parsed.success) {
      throw new GovernanceError("Calendar event failed validation", "PROPOSAL_INVALID", {
        issues: parsed.error.issues,
      });
    }

    const now = this.clock();
    const verdict = confirmationFreshness(confirmedAt, now);
    if (verdict !== "fresh") {
      this.logger.warn({ verdict }, "calendar write refused: confirmation not fresh");
      this.evidence.append("calendar_write_refused", "calendar", {
        verdict,
        confirmedAt: confirmedAt.toISOString(),
        attemptedAt: now.toISOString(),
      });
      throw verdict === "future"
        ? new GovernanceError("Confirmation timestamp is in the future", "CONFIRMATION_OUT_OF_ORDER", {
            confirmedAt: confirmedAt.toISOString(),
          })
        : new GovernanceError("Confirmation is older than the freshness window", "CONFIRMATION_EXPIRED", {
            confirmedAt: confirmedAt.toISOString(),
          });
    }

    const result = await this.service.createEvent(parsed.data, confirmedAt);
    this.evidence.append("calendar_event_created", result.eventId, {
      startsAt: parsed.data.startsAt,
      attendeeCount: parsed.data.attendees.length,
    });
    return result;
  }
}
