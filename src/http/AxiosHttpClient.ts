import Axios, { AxiosInstance } from "axios";
import { endpointUrl } from "../config";
import { HttpClient, HttpReply, HttpRequest } from "./HttpClient";

function flattenHeaders(headers: object): Record<string, string> {
    const flat: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
        if (typeof value === "string") {
            flat[name] = value;
        } else if (typeof value === "number" || typeof value === "boolean") {
            flat[name] = String(value);
        } else if (Array.isArray(value)) {
            flat[name] = value.join(", ");
        }
    }
    return flat;
}

export class AxiosHttpClient implements HttpClient {
    private readonly httpClient: AxiosInstance;

    constructor(httpClient?: AxiosInstance) {
        this.httpClient = httpClient ?? Axios.create();
    }

    async post(request: HttpRequest): Promise<HttpReply> {
        const response = await this.httpClient.request<unknown>({
            url: endpointUrl(request),
            method: request.method,
            data: request.body,
            headers: request.headers,
            timeout: request.timeout,
            responseType: "text",
            // Bodies are XML; keep axios from trying JSON on them.
            transformResponse: (data: unknown) => data,
            validateStatus: () => true,
        });
        const { data } = response;
        return {
            status: response.status,
            headers: flattenHeaders(response.headers),
            body: typeof data === "string" ? data : data == null ? "" : String(data),
        };
    }
}
