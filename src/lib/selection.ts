export type ApplicationName = string;

export type Mode = "normal" | "search";

export type Direction = "next" | "previous";

export type QueryEdit = { type: "append"; char: string } | { type: "backspace" };

export type ActionStatus =
	| { kind: "none" }
	| { kind: "opened"; name: ApplicationName }
	| { kind: "killed"; name: ApplicationName }
	| { kind: "failed"; name: ApplicationName; reason: string };

export type InstalledAppScanner = () => Promise<ApplicationName[]>;

export interface SelectionOptions {
	/** Render ticks a status message stays on screen. */
	statusTicks?: number;
}

/** ~3 seconds at 100ms per tick. */
export const STATUS_DISPLAY_TICKS = 30;

const NO_STATUS: ActionStatus = { kind: "none" };

export function clampIndex(index: number, length: number): number {
	if (length === 0) {
		return 0;
	}
	return Math.min(index, length - 1);
}

export function filterApplications(
	apps: readonly ApplicationName[],
	query: string,
): ApplicationName[] {
	if (query === "") {
		return [...apps];
	}

	const needle = query.toLowerCase();
	return apps.filter((app) => app.toLowerCase().includes(needle));
}

/**
 * Session state behind the interactive list: which candidates are shown,
 * which one is selected, and the transient action status in the footer.
 */
export class SelectionState {
	private running: ApplicationName[];
	private installed: ApplicationName[] = [];
	private installedLoaded = false;
	private filtered: ApplicationName[] = [];
	private currentMode: Mode = "normal";
	private query = "";
	private index = 0;
	private currentStatus: ActionStatus = NO_STATUS;
	private countdown = 0;
	private readonly statusTicks: number;

	constructor(
		runningApps: ApplicationName[] = [],
		options: SelectionOptions = {},
	) {
		this.running = [...runningApps];
		this.statusTicks = options.statusTicks ?? STATUS_DISPLAY_TICKS;
	}

	get runningApps(): readonly ApplicationName[] {
		return this.running;
	}

	get installedApps(): readonly ApplicationName[] {
		return this.installed;
	}

	get filteredApps(): readonly ApplicationName[] {
		return this.filtered;
	}

	get mode(): Mode {
		return this.currentMode;
	}

	get searchQuery(): string {
		return this.query;
	}

	get selectedIndex(): number {
		return this.index;
	}

	get status(): ActionStatus {
		return this.currentStatus;
	}

	get statusCountdown(): number {
		return this.countdown;
	}

	/**
	 * The list navigation and selection operate on for the current mode.
	 */
	activeList(): readonly ApplicationName[] {
		switch (this.currentMode) {
			case "normal":
				return this.running;
			case "search":
				return this.filtered;
		}
	}

	advance(direction: Direction): void {
		const length = this.activeList().length;
		if (length === 0) {
			return;
		}

		const delta = direction === "next" ? 1 : length - 1;
		this.index = (this.index + delta) % length;
	}

	editQuery(edit: QueryEdit): void {
		if (edit.type === "append") {
			this.query += edit.char;
		} else {
			// Drop the last code point so a surrogate pair is never split.
			this.query = Array.from(this.query).slice(0, -1).join("");
		}
		this.applyFilter();
	}

	/**
	 * Switch to searching installed applications. The scan runs at most
	 * once per session; if it rejects, the state is left as it was.
	 */
	async enterSearchMode(scan: InstalledAppScanner): Promise<void> {
		if (!this.installedLoaded) {
			const apps = await scan();
			this.installed = [...apps];
			this.installedLoaded = true;
		}

		this.currentMode = "search";
		this.query = "";
		this.applyFilter();
		this.index = 0;
	}

	exitSearchMode(): void {
		this.currentMode = "normal";
		this.query = "";
		this.index = 0;
	}

	selectedName(): ApplicationName | undefined {
		return this.activeList()[this.index];
	}

	recordOpened(name: ApplicationName): void {
		this.setStatus({ kind: "opened", name });
	}

	recordKilled(name: ApplicationName): void {
		this.setStatus({ kind: "killed", name });
	}

	recordFailed(name: ApplicationName, reason: string): void {
		this.setStatus({ kind: "failed", name, reason });
	}

	/** Called once per rendered frame. */
	tickStatus(): void {
		if (this.countdown > 0) {
			this.countdown -= 1;
			if (this.countdown === 0) {
				this.currentStatus = NO_STATUS;
			}
		}
	}

	refreshRunning(names: ApplicationName[]): void {
		this.running = [...names];
		this.index = clampIndex(this.index, this.running.length);
	}

	private setStatus(status: ActionStatus): void {
		this.currentStatus = status;
		this.countdown = this.statusTicks;
	}

	private applyFilter(): void {
		this.filtered = filterApplications(this.installed, this.query);
		this.index = clampIndex(this.index, this.filtered.length);
	}
}
