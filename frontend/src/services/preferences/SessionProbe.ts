import { getLog } from "../../util/Logger";
import type { Client } from "mailhub-common";

const log = getLog(import.meta);

/** Meta tag the server renders for signed-in visitors */
export const AUTHENTICATED_META_SELECTOR = 'meta[name="mailhub-authenticated"]';
/** Top pane component, which carries the server-rendered auth state */
export const TOP_PANE_SELECTOR = '[data-mailhub-component="top-pane"]';

/**
 * Decides whether the current visitor has a session with the identity service.
 */
export interface SessionDetector {
	/**
	 * Asks the identity service. Never rejects: every failure reads as "not authenticated".
	 */
	detect(): Promise<boolean>;
	/**
	 * Inspects server-rendered markers of the page, for rendering before {@link detect} resolves.
	 */
	detectFromPage(): boolean;
}

export class SessionProbe implements SessionDetector {
	constructor(
		private readonly client: Client,
		private readonly page: () => Document = () => document,
	) {}

	async detect(): Promise<boolean> {
		try {
			const session = await this.client.session().verify();
			const authenticated = session !== undefined;
			log.debug("Session probe finished, authenticated=%s", authenticated);
			return authenticated;
		} catch (error) {
			log.warn(error, "Session probe failed; continuing without a session");
			return false;
		}
	}

	detectFromPage(): boolean {
		try {
			const doc = this.page();
			const meta = doc.querySelector(AUTHENTICATED_META_SELECTOR);
			if (meta?.getAttribute("content") === "true") {
				return true;
			}
			const topPane = doc.querySelector(TOP_PANE_SELECTOR);
			return topPane?.getAttribute("data-auth-state") === "authenticated";
		} catch (error) {
			log.warn(error, "Unable to inspect page for session markers");
			return false;
		}
	}
}
