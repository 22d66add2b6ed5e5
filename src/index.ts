export * from "./BoshSession";
export * from "./BoshTransport";
export * from "./config";
export * from "./errors";
export * from "./Logger";
export * from "./SessionMessages";
export * from "./http/AxiosHttpClient";
export * from "./http/HttpClient";
export * from "./http/HttpDispatcher";
export * from "./xmpp/BodyParser";
export * from "./xmpp/BodyWrapper";
export * from "./xmpp/BoshSessionData";
export * from "./xmpp/StreamElements";
