export enum HttpMethod {
  Get = 'GET',
  Post = 'POST',
  Put = 'PUT',
  Patch = 'PATCH',
  Delete = 'DELETE',
  Head = 'HEAD',
  Options = 'OPTIONS',
}

export enum HeaderField {
  Accept = 'accept',
  AcceptEncoding = 'accept-encoding',
  Allow = 'allow',
  CacheControl = 'cache-control',
  ContentEncoding = 'content-encoding',
  ContentLength = 'content-length',
  ContentType = 'content-type',
  ETag = 'etag',
  LastModified = 'last-modified',
  Location = 'location',
  RequestId = 'x-request-id',
  Vary = 'vary',
}

export enum ContentType {
  Text = 'text/plain',
  Json = 'application/json',
  FormUrlEncoded = 'application/x-www-form-urlencoded',
}

/**
 * Broadcast points of a request, in the order the kernel reaches them.
 * `Exception` only runs when something failed.
 */
export enum KernelStage {
  RequestStart = 'request-start',
  RouteMatched = 'route-matched',
  ArgumentsResolving = 'arguments-resolving',
  ActionInvoking = 'action-invoking',
  ResponseReady = 'response-ready',
  Exception = 'exception',
  RequestEnd = 'request-end',
}
