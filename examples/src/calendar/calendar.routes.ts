import {
  defineAction,
  DerivedValueToken,
  HttpMethod,
  param,
  ParamTypes,
  type RouteRegistrar,
  SwitchyardRequest,
} from '@switchyard/http-adapter';
import { z } from 'zod';

export interface CalendarEvent {
  readonly id: number;
  readonly title: string;
  readonly app: string;
}

const EVENTS: readonly CalendarEvent[] = [
  { id: 1, title: 'Planning', app: 'office' },
  { id: 2, title: 'Retrospective', app: 'office' },
  { id: 3, title: 'Climbing', app: 'personal' },
];

const limit = param.query('limit', ParamTypes.integer, { default: 20, constraints: [z.number().int().min(1).max(100)] });

export function registerCalendarRoutes(routes: RouteRegistrar): void {
  routes.group({ prefix: '/calendar', namePrefix: 'calendar.' }, calendar => {
    calendar.register({
      name: 'events',
      methods: HttpMethod.Get,
      path: '/events',
      action: defineAction({
        name: 'calendar.events',
        parameters: [limit, param.derived('request', DerivedValueToken.Request)],
        handle: (max, request) => ({
          requestId: request instanceof SwitchyardRequest ? request.requestId : null,
          events: EVENTS.slice(0, Number(max)),
        }),
      }),
    });
    calendar.register({
      name: 'external',
      methods: HttpMethod.Get,
      path: '/external',
      format: 'text',
      action: defineAction({ name: 'calendar.external', handle: () => 'No external calendar is connected.' }),
    });
    calendar.register({
      name: 'external.show',
      methods: HttpMethod.Get,
      path: '/external/:id{\\d+}',
      action: defineAction({
        name: 'calendar.external.show',
        parameters: [param.path('id', ParamTypes.integer)],
        handle: id => ({ id, connected: false }),
      }),
    });

    calendar.group({ prefix: '/:app_name', namePrefix: 'app.', requirements: { app_name: /[a-z][a-z0-9-]*/ } }, app => {
      app.register({
        name: 'events',
        methods: HttpMethod.Get,
        path: '/events',
        action: defineAction({
          name: 'calendar.app.events',
          parameters: [param.path('app_name'), limit],
          handle: (appName, max) => EVENTS.filter(event => event.app === appName).slice(0, Number(max)),
        }),
      });
    });
  });
}
