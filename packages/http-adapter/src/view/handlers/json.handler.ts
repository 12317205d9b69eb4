import { ContentType } from '../../enums';
import type { SwitchyardRequest } from '../../http/request';
import { JsonResponse } from '../../http/json-response';
import type { SwitchyardResponse } from '../../http/response';
import type { FormatHandler } from '../interfaces';
import type { View } from '../view';

export class JsonFormatHandler implements FormatHandler {
  readonly format = 'json';
  readonly mimeTypes = [ContentType.Json, 'application/problem+json'];

  render(view: View, _request: SwitchyardRequest, _format: string): SwitchyardResponse {
    return new JsonResponse(view.data, view.status, view.headers);
  }
}
