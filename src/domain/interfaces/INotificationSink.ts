export interface INotificationSink {
    /** Resolves false on delivery failure; never rejects */
    send(text: string): Promise<boolean>;
}
