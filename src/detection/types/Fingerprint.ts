import { z } from 'zod';

/**
 * Truthiness of a loosely-typed payload value. Empty arrays and empty
 * objects count as absent, as does anything falsy.
 */
export function isTruthy(value: unknown): boolean {
    if (Array.isArray(value)) {
        return value.length > 0;
    }
    if (value !== null && typeof value === 'object') {
        return Object.keys(value).length > 0;
    }
    return Boolean(value);
}

/**
 * Whether a value is a plain (non-array) JSON object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

const flag = z.unknown().transform(isTruthy);

const flagDefaultTrue = z.unknown().transform((value) => (value === undefined ? true : isTruthy(value)));

const numeric = z
    .preprocess(
        (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
        z.number().finite(),
    )
    .optional()
    .catch(undefined);

const text = z.string().optional().catch(undefined);

const textLike = z
    .union([z.string(), z.number()])
    .transform(String)
    .optional()
    .catch(undefined);

const list = z.array(z.unknown()).optional().catch(undefined);

const stringList = z
    .array(z.unknown())
    .transform((items) => items.filter((item): item is string => typeof item === 'string'))
    .optional()
    .catch(undefined);

const record = z.record(z.string(), z.unknown()).optional().catch(undefined);

const booleanMap = z
    .record(z.string(), z.unknown())
    .transform((raw) =>
        Object.fromEntries(
            Object.entries(raw).filter((entry): entry is [string, boolean] => typeof entry[1] === 'boolean'),
        ),
    )
    .optional()
    .catch(undefined);

/**
 * A nested section that is present only when the raw value is a non-empty object
 */
function section<T extends z.ZodRawShape>(shape: T) {
    const schema = z.object(shape);
    return z
        .record(z.string(), z.unknown())
        .transform((raw) => (Object.keys(raw).length > 0 ? schema.parse(raw) : undefined))
        .optional()
        .catch(undefined);
}

/**
 * Window globals left behind by automation frameworks
 */
export const AUTOMATION_GLOBALS = [
    '__webdriver',
    '__driver',
    '__selenium',
    '__nightmare',
    '__phantomas',
    'callPhantom',
    '_phantom',
    'domAutomation',
    'domAutomationController',
] as const;

export type AutomationGlobal = (typeof AUTOMATION_GLOBALS)[number];

/**
 * Lenient schema for the client-collected payload. Every field tolerates
 * absence and wrong types; unknown keys are stripped.
 */
export const RawFingerprintSchema = z.object({
    webdriver: flag,
    headless: flag,
    __webdriver: flag,
    __driver: flag,
    __selenium: flag,
    __nightmare: flag,
    __phantomas: flag,
    callPhantom: flag,
    _phantom: flag,
    domAutomation: flag,
    domAutomationController: flag,

    plugins: numeric,
    languages: list,
    language: text,
    canvas: textLike,
    webgl_vendor: text,
    webgl_renderer: text,
    screen_width: numeric,
    screen_height: numeric,
    timezone: text,
    timezone_offset: numeric,
    platform: text,
    hardware_concurrency: numeric,

    chrome: flag,
    chrome_runtime: flag,
    permissions_query_unavailable: flag,
    notification_permission: text,

    ip_info: section({
        is_datacenter: flag,
        is_vpn: flag,
        is_proxy: flag,
        is_tor: flag,
    }),
    webrtc_ips: stringList,
    tls_fingerprint: z.unknown(),

    has_mouse_movement: flag,
    has_keyboard_input: flag,
    touch_support: flag,
    has_page_focus: flagDefaultTrue,
    has_scroll: flag,

    mouse_behavior: section({
        total_movements: numeric,
        average_velocity: numeric,
        max_velocity: numeric,
        average_acceleration: numeric,
        has_human_curves: flag,
    }),
    click_behavior: section({
        total_clicks: numeric,
        average_click_interval: numeric,
        click_rhythm_variance: numeric,
    }),
    scroll_behavior: section({
        total_scrolls: numeric,
        average_scroll_velocity: numeric,
        has_scrolled: flag,
    }),
    keyboard_behavior: section({
        average_dwell_time: numeric,
        average_flight_time: numeric,
        typing_rhythm: numeric,
    }),

    vm_detection: record,
    browser_extensions: record,
    advanced_timing: section({
        page_load_time: numeric,
        time_to_first_interaction: numeric,
        time_to_first_click: numeric,
        time_to_first_scroll: numeric,
    }),
    css_media_queries: booleanMap,
    css_media_queries_count: numeric,

    speech_synthesis_support: flag,
    speech_voices_count: numeric,
    speech_voice_hash: text,

    client_hints: section({
        mobile: flag,
        platform: text,
        brands: list,
    }),
    client_hints_high_entropy: record,
});

export type RawFingerprint = z.infer<typeof RawFingerprintSchema>;

export interface IpInfo {
    isDatacenter: boolean;
    isVpn: boolean;
    isProxy: boolean;
    isTor: boolean;
}

export interface MouseBehaviorData {
    totalMovements?: number;
    averageVelocity?: number;
    maxVelocity?: number;
    averageAcceleration?: number;
    hasHumanCurves: boolean;
}

export interface ClickBehaviorData {
    totalClicks?: number;
    averageClickInterval?: number;
    clickRhythmVariance?: number;
}

export interface ScrollBehaviorData {
    totalScrolls?: number;
    averageScrollVelocity?: number;
    hasScrolled: boolean;
}

export interface KeyboardBehaviorData {
    averageDwellTime?: number;
    averageFlightTime?: number;
    typingRhythm?: number;
}

export interface VmDetectionData {
    likelihood?: string;
    indicators: Record<string, boolean>;
}

export interface BrowserExtensionData {
    totalDetected?: number;
    flags: Record<string, boolean>;
}

export interface AdvancedTimingData {
    pageLoadTime?: number;
    timeToFirstInteraction?: number;
    timeToFirstClick?: number;
    timeToFirstScroll?: number;
}

export interface ClientHintsData {
    mobile: boolean;
    platform?: string;
    brands: unknown[];
}

/**
 * Normalized client fingerprint. Optional fields were absent or unusable in
 * the payload; analyzers supply their own defaults.
 */
export interface Fingerprint {
    /** The payload carried no keys at all */
    isEmpty: boolean;

    webdriver: boolean;
    headless: boolean;
    automationGlobals: Record<AutomationGlobal, boolean>;

    plugins?: number;
    languages?: unknown[];
    language?: string;
    canvas?: string;
    webglVendor?: string;
    webglRenderer?: string;
    screenWidth?: number;
    screenHeight?: number;
    timezone?: string;
    timezoneOffset?: number;
    platform?: string;
    hardwareConcurrency?: number;

    chrome: boolean;
    chromeRuntime: boolean;
    permissionsQueryUnavailable: boolean;
    notificationPermission?: string;

    ipInfo?: IpInfo;
    webrtcIps?: string[];
    tlsFingerprint?: unknown;

    hasMouseMovement: boolean;
    hasKeyboardInput: boolean;
    touchSupport: boolean;
    hasPageFocus: boolean;
    hasScroll: boolean;

    mouseBehavior?: MouseBehaviorData;
    clickBehavior?: ClickBehaviorData;
    scrollBehavior?: ScrollBehaviorData;
    keyboardBehavior?: KeyboardBehaviorData;

    vmDetection?: VmDetectionData;
    browserExtensions?: BrowserExtensionData;
    advancedTiming?: AdvancedTimingData;
    cssMediaQueries?: Record<string, boolean>;
    cssMediaQueriesCount?: number;

    speechSynthesisSupport: boolean;
    speechVoicesCount?: number;
    speechVoiceHash?: string;

    clientHints?: ClientHintsData;
    clientHintsHighEntropy?: Record<string, unknown>;
}

function pickBooleans(raw: Record<string, unknown>): Record<string, boolean> {
    return Object.fromEntries(
        Object.entries(raw).filter((entry): entry is [string, boolean] => typeof entry[1] === 'boolean'),
    );
}

function toFingerprint(raw: RawFingerprint, isEmpty: boolean): Fingerprint {
    const vm = raw.vm_detection && Object.keys(raw.vm_detection).length > 0 ? raw.vm_detection : undefined;
    const extensions =
        raw.browser_extensions && Object.keys(raw.browser_extensions).length > 0 ? raw.browser_extensions : undefined;

    return {
        isEmpty,
        webdriver: raw.webdriver,
        headless: raw.headless,
        automationGlobals: {
            __webdriver: raw.__webdriver,
            __driver: raw.__driver,
            __selenium: raw.__selenium,
            __nightmare: raw.__nightmare,
            __phantomas: raw.__phantomas,
            callPhantom: raw.callPhantom,
            _phantom: raw._phantom,
            domAutomation: raw.domAutomation,
            domAutomationController: raw.domAutomationController,
        },
        plugins: raw.plugins,
        languages: raw.languages,
        language: raw.language,
        canvas: raw.canvas,
        webglVendor: raw.webgl_vendor,
        webglRenderer: raw.webgl_renderer,
        screenWidth: raw.screen_width,
        screenHeight: raw.screen_height,
        timezone: raw.timezone,
        timezoneOffset: raw.timezone_offset,
        platform: raw.platform,
        hardwareConcurrency: raw.hardware_concurrency,
        chrome: raw.chrome,
        chromeRuntime: raw.chrome_runtime,
        permissionsQueryUnavailable: raw.permissions_query_unavailable,
        notificationPermission: raw.notification_permission,
        ipInfo: raw.ip_info && {
            isDatacenter: raw.ip_info.is_datacenter,
            isVpn: raw.ip_info.is_vpn,
            isProxy: raw.ip_info.is_proxy,
            isTor: raw.ip_info.is_tor,
        },
        webrtcIps: raw.webrtc_ips,
        tlsFingerprint: isTruthy(raw.tls_fingerprint) ? raw.tls_fingerprint : undefined,
        hasMouseMovement: raw.has_mouse_movement,
        hasKeyboardInput: raw.has_keyboard_input,
        touchSupport: raw.touch_support,
        hasPageFocus: raw.has_page_focus,
        hasScroll: raw.has_scroll,
        mouseBehavior: raw.mouse_behavior && {
            totalMovements: raw.mouse_behavior.total_movements,
            averageVelocity: raw.mouse_behavior.average_velocity,
            maxVelocity: raw.mouse_behavior.max_velocity,
            averageAcceleration: raw.mouse_behavior.average_acceleration,
            hasHumanCurves: raw.mouse_behavior.has_human_curves,
        },
        clickBehavior: raw.click_behavior && {
            totalClicks: raw.click_behavior.total_clicks,
            averageClickInterval: raw.click_behavior.average_click_interval,
            clickRhythmVariance: raw.click_behavior.click_rhythm_variance,
        },
        scrollBehavior: raw.scroll_behavior && {
            totalScrolls: raw.scroll_behavior.total_scrolls,
            averageScrollVelocity: raw.scroll_behavior.average_scroll_velocity,
            hasScrolled: raw.scroll_behavior.has_scrolled,
        },
        keyboardBehavior: raw.keyboard_behavior && {
            averageDwellTime: raw.keyboard_behavior.average_dwell_time,
            averageFlightTime: raw.keyboard_behavior.average_flight_time,
            typingRhythm: raw.keyboard_behavior.typing_rhythm,
        },
        vmDetection: vm && {
            likelihood: typeof vm.vm_likelihood === 'string' ? vm.vm_likelihood : undefined,
            indicators: pickBooleans(vm),
        },
        browserExtensions: extensions && {
            totalDetected: typeof extensions.total_detected === 'number' ? extensions.total_detected : undefined,
            flags: pickBooleans(extensions),
        },
        advancedTiming: raw.advanced_timing && {
            pageLoadTime: raw.advanced_timing.page_load_time,
            timeToFirstInteraction: raw.advanced_timing.time_to_first_interaction,
            timeToFirstClick: raw.advanced_timing.time_to_first_click,
            timeToFirstScroll: raw.advanced_timing.time_to_first_scroll,
        },
        cssMediaQueries: raw.css_media_queries,
        cssMediaQueriesCount: raw.css_media_queries_count,
        speechSynthesisSupport: raw.speech_synthesis_support,
        speechVoicesCount: raw.speech_voices_count,
        speechVoiceHash: raw.speech_voice_hash,
        clientHints: raw.client_hints && {
            mobile: raw.client_hints.mobile,
            platform: raw.client_hints.platform,
            brands: raw.client_hints.brands ?? [],
        },
        clientHintsHighEntropy: raw.client_hints_high_entropy,
    };
}

/**
 * Builds a Fingerprint from whatever arrived as the `fingerprint` value.
 * Never throws: anything that is not an object yields an empty fingerprint.
 */
export function parseFingerprint(payload: unknown): Fingerprint {
    const raw = isPlainObject(payload) ? payload : {};
    const parsed = RawFingerprintSchema.safeParse(raw);

    if (!parsed.success) {
        return toFingerprint(RawFingerprintSchema.parse({}), true);
    }

    return toFingerprint(parsed.data, Object.keys(raw).length === 0);
}

export const EMPTY_FINGERPRINT: Readonly<Fingerprint> = Object.freeze(parseFingerprint({}));
