// @karya/patra: Mail
export { Mail, createMail, MAIL_CATEGORIES } from "./mail.js";
export type {
	MailBody,
	MailCategory,
	MailJSON,
	StartBody,
	EndBody,
	NodeBody,
	NodeListBody,
	NodeIdBody,
	ConditionBody,
	ConditionRequestBody,
	ConditionReplyBody,
} from "./mail.js";
export { Mailbox } from "./mailbox.js";
export { MailManager } from "./mail-manager.js";
export type {
	MailSource,
	MailManagerEvent,
	MailManagerEventHandler,
	MailManagerOptions,
} from "./mail-manager.js";
