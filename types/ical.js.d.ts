// ical.js 1.x ships no type declarations; this covers the surface used in lib/ics-feed.ts.
declare module "ical.js" {
  namespace ICAL {
    interface Timezone {
      tzid: string;
    }

    class Time {
      year: number;
      month: number;
      day: number;
      hour: number;
      minute: number;
      second: number;
      isDate: boolean;
      /** TZID parameter of the property ("Z" for UTC), when it has one */
      timezone?: string;
      zone?: Timezone;
    }

    class Component {
      constructor(jCal: unknown[] | string);
      name: string;
      getAllSubcomponents(name?: string): Component[];
      hasProperty(name: string): boolean;
    }

    class Event {
      constructor(component?: Component);
      component: Component;
      summary: string | null;
      location: string | null;
      description: string | null;
      /** null when the VEVENT has no DTSTART */
      startDate: Time | null;
      /** Reads DTEND, or DTSTART plus DURATION; needs a DTSTART */
      endDate: Time;
    }

    function parse(input: string): unknown[];
  }

  export = ICAL;
}
