export interface HttpRequest {
    host: string,
    port: number,
    secure: boolean,
    path: string,
    method: "POST",
    headers: Record<string, string>,
    body: string,
    // milliseconds, 0 for no limit
    timeout: number,
}

export interface HttpReply {
    status: number,
    headers: Record<string, string>,
    body: string,
}

/**
 * The HTTP layer a session posts its bodies through. Implementations resolve
 * with whatever the server answered, whatever the status; they reject only
 * when no answer was received.
 */
export interface HttpClient {
    post(request: HttpRequest): Promise<HttpReply>;
}
