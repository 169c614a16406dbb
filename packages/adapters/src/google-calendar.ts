/**
 * Google Calendar REST adapter
 *
 * Books on the organizer's calendar and invites the attendee. Meetings are
 * placed three days out at 14:00 UTC; the attendee reschedules from the
 * invitation.
 */

import type { CalendarAdapter, MeetingBooking, MeetingRequest } from './types'
import { bearerHeaders, readJsonObject, readString } from './http'

const CALENDAR_API = 'https://www.googleapis.com/calendar/v3/calendars'

export function meetingStartTime(now: Date): Date {
  const start = new Date(now.getTime() + 3 * 24 * 60 * 60 * 1000)
  start.setUTCHours(14, 0, 0, 0)
  return start
}

export class GoogleCalendarAdapter implements CalendarAdapter {
  readonly name = 'google-calendar'

  constructor(
    private readonly accessToken: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createMeeting(request: MeetingRequest): Promise<MeetingBooking> {
    const start = meetingStartTime(this.now())
    const end = new Date(start.getTime() + request.durationMinutes * 60 * 1000)
    const url = `${CALENDAR_API}/${encodeURIComponent(request.organizer)}/events?sendUpdates=all`

    const res = await fetch(url, {
      method: 'POST',
      headers: bearerHeaders(this.accessToken),
      body: JSON.stringify({
        summary: request.title,
        description: request.description,
        start: { dateTime: start.toISOString(), timeZone: 'UTC' },
        end: { dateTime: end.toISOString(), timeZone: 'UTC' },
        attendees: [{ email: request.invitee }],
        reminders: {
          useDefault: false,
          overrides: [
            { method: 'email', minutes: 24 * 60 },
            { method: 'popup', minutes: 30 },
          ],
        },
      }),
    })
    const data = await readJsonObject(res, 'Google Calendar')

    const eventId = readString(data, 'id')
    if (!eventId) {
      throw new Error('Google Calendar response is missing the event id')
    }
    return {
      eventId,
      link: readString(data, 'htmlLink') ?? '',
      startTime: start.toISOString(),
    }
  }
}
