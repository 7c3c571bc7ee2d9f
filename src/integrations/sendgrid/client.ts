import type { FastifyBaseLogger } from 'fastify';

export interface TemplateMail {
  to: string;
  templateId: string;
  data: Record<string, unknown>;
}

export interface Mailer {
  sendTemplate(mail: TemplateMail): Promise<void>;
}

export interface SendGridClientConfig {
  apiKey: string;
  fromEmail: string;
  enabled: boolean;
  timeoutMs?: number;
  baseUrl?: string;
}

export class SendGridClient implements Mailer {
  private apiKey: string;
  private fromEmail: string;
  private enabled: boolean;
  private timeoutMs: number;
  private baseUrl: string;

  constructor(
    config: SendGridClientConfig,
    private log: FastifyBaseLogger
  ) {
    this.apiKey = config.apiKey;
    this.fromEmail = config.fromEmail;
    this.enabled = config.enabled;
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.baseUrl = config.baseUrl || 'https://api.sendgrid.com/v3';
  }

  async sendTemplate(mail: TemplateMail): Promise<void> {
    if (!this.enabled) {
      this.log.info({ to: mail.to, templateId: mail.templateId, data: mail.data }, '[mail] Email disabled, not sending');
      return;
    }

    const response = await fetch(`${this.baseUrl}/mail/send`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        from: { email: this.fromEmail },
        personalizations: [
          {
            to: [{ email: mail.to }],
            dynamic_template_data: mail.data,
          },
        ],
        template_id: mail.templateId,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    // SendGrid answers 202 Accepted on success
    if (response.status !== 202) {
      const errorText = await response.text();
      throw new Error(`SendGrid error ${response.status}: ${errorText}`);
    }

    this.log.info({ to: mail.to, templateId: mail.templateId }, '[mail] Email sent');
  }
}
