import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { SmtpSettings } from "./config";
import { escapeHtml } from "./html";

interface EmailAttachment {
  filename: string;
  content: Buffer | string;
  contentType?: string;
}

interface EmailOptions {
  to: string;
  subject: string;
  html: string;
  text?: string;
  attachments?: EmailAttachment[];
}

export interface DataExportDelivery {
  shopDomain: string;
  remoteRequestId: string;
  customerRemoteId: string | null;
  snapshot: unknown;
}

export interface DeliveryResult {
  delivered: boolean;
  messageId?: string;
}

/** Where customer data exports go once the snapshot is built. */
export interface ExportTransport {
  deliverDataExport(delivery: DataExportDelivery): Promise<DeliveryResult>;
}

export interface EmailServiceOptions {
  transporter: Transporter | null;
  fromEmail: string;
  fromName: string;
  recipient: string | null;
}

export class EmailService implements ExportTransport {
  constructor(private readonly options: EmailServiceOptions) {}

  static fromConfig(smtp: SmtpSettings | null, recipient: string | null): EmailService {
    if (!smtp) {
      console.log("SMTP env vars not configured - data exports will be logged only");
      return new EmailService({ transporter: null, fromEmail: "", fromName: "", recipient });
    }
    const transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.secure,
      auth: {
        user: smtp.user,
        pass: smtp.password,
      },
    });
    return new EmailService({
      transporter,
      fromEmail: smtp.fromEmail,
      fromName: smtp.fromName,
      recipient,
    });
  }

  async verify(): Promise<boolean> {
    if (!this.options.transporter) return false;
    try {
      await this.options.transporter.verify();
      console.log("SMTP connection verified successfully");
      return true;
    } catch (error) {
      console.error("Failed to verify SMTP connection:", error);
      return false;
    }
  }

  /** Throws when the transport rejects the message. */
  async sendEmail(options: EmailOptions): Promise<DeliveryResult> {
    const { transporter, fromEmail, fromName } = this.options;
    if (!transporter) {
      console.log(`SMTP not configured - skipping email "${options.subject}"`);
      return { delivered: false };
    }

    const info = await transporter.sendMail({
      from: `"${fromName}" <${fromEmail}>`,
      to: options.to,
      subject: options.subject,
      html: options.html,
      text: options.text || options.html.replace(/<[^>]*>/g, ""),
      attachments: options.attachments?.map((att) => ({
        filename: att.filename,
        content: att.content,
        contentType: att.contentType || "application/json",
      })),
    });
    return { delivered: true, messageId: info.messageId };
  }

  async deliverDataExport(delivery: DataExportDelivery): Promise<DeliveryResult> {
    const { recipient } = this.options;
    if (!recipient) {
      console.log(
        `[Compliance] No DATA_EXPORT_EMAIL configured - export for request ${delivery.remoteRequestId} ` +
        `(${delivery.shopDomain}) stored only`
      );
      return { delivered: false };
    }

    const subject = `Customer data request ${delivery.remoteRequestId} for ${delivery.shopDomain}`;
    const html =
      `<p>The customer data export for request <strong>${escapeHtml(delivery.remoteRequestId)}</strong> ` +
      `from <strong>${escapeHtml(delivery.shopDomain)}</strong> is attached.</p>` +
      (delivery.customerRemoteId ? `<p>Customer id: ${escapeHtml(delivery.customerRemoteId)}</p>` : "");

    return this.sendEmail({
      to: recipient,
      subject,
      html,
      attachments: [{
        filename: `data-request-${delivery.remoteRequestId}.json`,
        content: JSON.stringify(delivery.snapshot, null, 2),
        contentType: "application/json",
      }],
    });
  }
}
