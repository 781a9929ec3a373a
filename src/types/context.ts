/**
 * Identity of the caller for one request. Built by the auth middleware from
 * a verified token and passed explicitly into every core operation.
 */
export interface RequestContext {
  userId: string;
}
