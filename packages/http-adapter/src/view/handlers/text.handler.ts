import { ContentType } from '../../enums';
import type { SwitchyardRequest } from '../../http/request';
import { SwitchyardResponse } from '../../http/response';
import type { FormatHandler } from '../interfaces';
import type { View } from '../view';

function toText(data: unknown): string {
  if (data === null || data === undefined) {
    return '';
  }

  if (typeof data === 'object') {
    return JSON.stringify(data);
  }

  return String(data);
}

export class TextFormatHandler implements FormatHandler {
  readonly format = 'text';
  readonly mimeTypes = [ContentType.Text];

  render(view: View, _request: SwitchyardRequest, _format: string): SwitchyardResponse {
    return new SwitchyardResponse(toText(view.data), view.status, view.headers).setContentType(ContentType.Text);
  }
}
