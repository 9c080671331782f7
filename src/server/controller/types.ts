// Parts of the express request and response used by the controllers.

export interface QueryRequest {
    query: { [key: string]: unknown },
}

export interface SendResponse {
    status(code: number): SendResponse,
    send(body?: unknown): unknown,
}
