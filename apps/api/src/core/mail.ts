import nodemailer, { type Transporter } from 'nodemailer';

export type MailConfig = {
  host?: string;
  port: number;
  user?: string;
  pass?: string;
  from?: string;
};

export type MailAttachment = {
  filename: string;
  content: Buffer;
  contentType: string;
  cid?: string;
};

export interface Mailer {
  sendMail(opts: {
    to: string;
    subject: string;
    html: string;
    text?: string;
    attachments?: MailAttachment[];
  }): Promise<boolean>;
}

function createTransporter(config: MailConfig): Transporter {
  // No SMTP => dummy mode that only serializes the message
  if (!config.host) {
    console.warn('[mail] SMTP_HOST not configured, mail is logged and dropped.');
    return nodemailer.createTransport({ jsonTransport: true });
  }

  console.log('[mail] creating SMTP transporter:', {
    host: config.host,
    port: config.port,
    hasUser: !!(config.user && config.pass)
  });

  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    auth: config.user && config.pass ? { user: config.user, pass: config.pass } : undefined
  });
}

export function createMailer(config: MailConfig): Mailer {
  let transporter: Transporter | null = null;

  return {
    async sendMail(opts) {
      const from = config.from || config.user;
      if (!from) {
        console.warn('[mail] MAIL_FROM/SMTP_USER not configured, not sending to', opts.to);
        return false;
      }

      transporter ??= createTransporter(config);

      const info = await transporter.sendMail({ from, ...opts });
      console.log('[mail] sent', { to: opts.to, messageId: info.messageId });
      return true;
    }
  };
}

function escapeHtml(s: string) {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function passEmail(input: { visitorName: string; expiresAt: Date; qrPng: Buffer }) {
  const name = escapeHtml(input.visitorName);
  const until = input.expiresAt.toISOString();

  return {
    subject: 'Your visitor pass',
    text: `Hello ${input.visitorName}, your visitor pass is attached. It can be used once and is valid until ${until}.`,
    html: `<p>Hello ${name},</p>
<p>Show this code at the checkpoint. It can be used once and is valid until ${until}.</p>
<p><img src="cid:visitor-pass" alt="Visitor pass QR code" width="320" height="320" /></p>`,
    attachments: [
      { filename: 'visitor-pass.png', content: input.qrPng, contentType: 'image/png', cid: 'visitor-pass' }
    ]
  };
}
