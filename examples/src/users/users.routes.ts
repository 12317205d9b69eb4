import {
  defineAction,
  HttpMethod,
  param,
  ParamTypes,
  type RouteRegistrar,
  StatusCodes,
  type UrlParamValue,
  View,
} from '@switchyard/http-adapter';
import { z } from 'zod';

import type { UsersService } from './users.service';

const userId = param.path('id', ParamTypes.integer, { constraints: [z.number().int().positive()] });
const name = param.body('name', ParamTypes.string, { constraints: [z.string().min(2).max(80)] });
const email = param.body('email', ParamTypes.string, { constraints: [z.string().email()] });

export type UrlGenerator = (name: string, params?: Readonly<Record<string, UrlParamValue>>) => string;

export function registerUserRoutes(routes: RouteRegistrar, users: UsersService, urlFor: UrlGenerator): void {
  routes.group({ prefix: '/users', namePrefix: 'users.', requirements: { id: /\d+/ } }, group => {
    group.register({
      name: 'index',
      methods: HttpMethod.Get,
      path: '',
      action: defineAction({ name: 'users.index', handle: () => users.findAll() }),
    });
    group.register({
      name: 'show',
      methods: HttpMethod.Get,
      path: '/:id',
      action: defineAction({
        name: 'users.show',
        parameters: [userId],
        handle: id => users.findOneById(Number(id)),
      }),
    });
    group.register({
      name: 'create',
      methods: HttpMethod.Post,
      path: '',
      action: defineAction({
        name: 'users.create',
        parameters: [name, email],
        handle: (userName, userEmail) => {
          const user = users.create({ name: String(userName), email: String(userEmail) });

          return new View(user, StatusCodes.CREATED, { location: urlFor('users.show', { id: user.id }) });
        },
      }),
    });
    group.register({
      name: 'update',
      methods: HttpMethod.Put,
      path: '/:id',
      action: defineAction({
        name: 'users.update',
        parameters: [userId, name, email],
        handle: (id, userName, userEmail) => users.update(Number(id), { name: String(userName), email: String(userEmail) }),
      }),
    });
    group.register({
      name: 'delete',
      methods: HttpMethod.Delete,
      path: '/:id',
      action: defineAction({
        name: 'users.delete',
        parameters: [userId],
        returns: 'void',
        handle: id => {
          users.delete(Number(id));
        },
      }),
    });
  });
}
