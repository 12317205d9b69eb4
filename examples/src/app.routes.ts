import { defineAction, HttpMethod, param, type RouteTable } from '@switchyard/http-adapter';

import { registerCalendarRoutes } from './calendar/calendar.routes';
import { UserRepository } from './users/users.repository';
import { registerUserRoutes } from './users/users.routes';
import { UsersService } from './users/users.service';

export interface AppServices {
  readonly users: UsersService;
}

export function createAppServices(): AppServices {
  const repository = new UserRepository([
    { name: 'Ada Lovelace', email: 'ada@example.com' },
    { name: 'Alan Turing', email: 'alan@example.com' },
  ]);

  return { users: new UsersService(repository) };
}

export function registerAppRoutes(table: RouteTable, services: AppServices = createAppServices()): void {
  table.register({
    name: 'constraints',
    methods: HttpMethod.Get,
    path: '/get/constraints/:time',
    requirements: { time: '\\d:\\d:\\d' },
    action: defineAction({
      name: 'constraints',
      parameters: [param.path('time')],
      handle: time => time,
    }),
  });

  registerCalendarRoutes(table);
  registerUserRoutes(table, services.users, (name, params) => table.resolveByName(name, params));
}
