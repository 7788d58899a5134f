import Twilio from "twilio";

export interface TwilioConfigs {
    accountSid: string;
    authToken: string;
    fromNumber: string;
    timeoutMs: number;
}

export interface OutboundCallParams {
    to: string;
    twimlUrl: string;
    statusCallbackUrl: string;
}

export type CallResult =
    | { success: true; message: string; callSid: string; status: string }
    | { success: false; message: string; error: string };

export interface CallPlacer {
    createCall(params: OutboundCallParams): Promise<CallResult>;
}

export const STATUS_CALLBACK_EVENTS = ['initiated', 'ringing', 'answered', 'completed'];

export class TwilioClient implements CallPlacer {
    private client: ReturnType<typeof Twilio>;
    private configs: TwilioConfigs;

    constructor(configs: TwilioConfigs) {
        this.configs = configs;
        this.client = Twilio(configs.accountSid, configs.authToken, {
            httpClient: new Twilio.RequestClient({ timeout: configs.timeoutMs })
        });
    }

    async createCall(params: OutboundCallParams): Promise<CallResult> {
        try {
            console.log('[TwilioClient] Creating call with TwiML URL:', params.twimlUrl);

            const call = await this.client.calls.create({
                to: params.to,
                from: this.configs.fromNumber,
                url: params.twimlUrl,
                method: 'POST',
                statusCallback: params.statusCallbackUrl,
                statusCallbackEvent: STATUS_CALLBACK_EVENTS,
                statusCallbackMethod: 'POST'
            });

            return {
                success: true,
                message: 'Call initiated successfully',
                callSid: call.sid,
                status: call.status || 'queued'
            };
        } catch (error) {
            console.error('[TwilioClient] Error creating call:', error);
            return {
                success: false,
                message: 'Failed to initiate call',
                error: error instanceof Error ? error.message : 'Unknown error'
            };
        }
    }
}
