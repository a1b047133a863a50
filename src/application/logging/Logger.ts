/**
 * Système de logging structuré.
 *
 * @module application/logging
 */

import type { LoggingConfig } from '../../core/SimulationConfig';
import { DEFAULT_CONFIG } from '../../core/SimulationConfig';

/**
 * Niveaux de log.
 */
export enum LogLevel {
    DEBUG = 'debug',
    INFO = 'info',
    WARNING = 'warning',
    ERROR = 'error',
}

/**
 * Entrée de log structurée.
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: number;
    data?: unknown;
}

interface PlanarVector {
    x: number;
    y: number;
}

/**
 * Snapshot de l'état de l'obus pour logging.
 */
export interface FlightSnapshot {
    time: number;
    position: PlanarVector;
    velocity: PlanarVector;
    speed: number;
    altitude: number;
    mach: number;
    dragCoefficient: number;
    accelerations: {
        gravity: PlanarVector;
        drag: PlanarVector;
        total: PlanarVector;
    };
}

/**
 * Buffer circulaire pour logs.
 */
export class LogBuffer {
    private buffer: LogEntry[] = [];
    private maxSize: number;

    constructor(maxSize = 32) {
        this.maxSize = maxSize;
    }

    add(entry: LogEntry): void {
        this.buffer.push(entry);
        if (this.buffer.length > this.maxSize) {
            this.buffer.shift();
        }
    }

    getAll(): readonly LogEntry[] {
        return this.buffer;
    }

    clear(): void {
        this.buffer = [];
    }
}

/**
 * Formatte un nombre avec gestion des valeurs aberrantes.
 */
export function formatNumber(value: number, decimals = 2, width = 7): string {
    if (!Number.isFinite(value)) {
        return 'NaN'.padStart(width, ' ');
    }

    const absValue = Math.abs(value);

    // Valeurs aberrantes (>1e10) en notation scientifique compacte
    if (absValue > 1e10) {
        const exp = Math.floor(Math.log10(absValue));
        const mantissa = value / Math.pow(10, exp);
        return `${mantissa.toFixed(1)}e${exp}`.padStart(width, ' ');
    }

    return value.toFixed(decimals).padStart(width, ' ');
}

/**
 * Logger principal.
 */
export class Logger {
    private buffer: LogBuffer;
    private callbacks: Set<(entry: LogEntry) => void> = new Set();
    private snapshotBuffer: FlightSnapshot[] = [];
    private maxSnapshotSize = 10;
    private enabled: boolean;
    private consoleOutput: boolean;

    constructor(config: Partial<LoggingConfig> = {}) {
        const settings = { ...DEFAULT_CONFIG.logging, ...config };
        this.buffer = new LogBuffer(settings.bufferSize);
        this.enabled = settings.enabled;
        this.consoleOutput = settings.consoleOutput;
    }

    debug(message: string, data?: unknown): void {
        this.log(LogLevel.DEBUG, message, data);
    }

    info(message: string, data?: unknown): void {
        this.log(LogLevel.INFO, message, data);
    }

    warning(message: string, data?: unknown): void {
        this.log(LogLevel.WARNING, message, data);
    }

    error(message: string, data?: unknown): void {
        this.log(LogLevel.ERROR, message, data);
    }

    /**
     * Log un départ de coup.
     */
    shot(message: string, data?: unknown): void {
        this.log(LogLevel.INFO, `[TIR] ${message}`, data);
    }

    /**
     * Log une fin de tir (sol ou plafond de durée).
     */
    impact(message: string, data?: unknown): void {
        this.log(LogLevel.INFO, `[IMPACT] ${message}`, data);
    }

    /**
     * Log les commandes du canon.
     */
    control(message: string, data?: unknown): void {
        this.log(LogLevel.DEBUG, `[CTRL] ${message}`, data);
    }

    /**
     * Log un snapshot de l'obus.
     * Maintient un buffer circulaire des 10 derniers snapshots.
     */
    logFlightSnapshot(snapshot: FlightSnapshot): void {
        if (!this.enabled) return;
        this.snapshotBuffer.push(snapshot);
        if (this.snapshotBuffer.length > this.maxSnapshotSize) {
            this.snapshotBuffer.shift();
        }
    }

    getFlightSnapshots(): readonly FlightSnapshot[] {
        return this.snapshotBuffer;
    }

    /**
     * Formate les snapshots pour affichage.
     */
    formatSnapshots(): string {
        if (this.snapshotBuffer.length === 0) {
            return 'Aucune donnée de vol disponible';
        }

        const lines: string[] = [];
        lines.push('═══════════════════════════════════════════════════════════════════');
        lines.push(`JOURNAL DE VOL - ${this.snapshotBuffer.length} DERNIÈRES ENTRÉES`);
        lines.push('═══════════════════════════════════════════════════════════════════');
        lines.push('');

        this.snapshotBuffer.forEach((snapshot, index) => {
            const num = (index + 1).toString().padStart(2, '0');
            const { gravity, drag, total } = snapshot.accelerations;

            lines.push(`┌─ Entrée ${num} ── T=${formatNumber(snapshot.time, 1, 6)}s`);
            lines.push(`│ POSITION    X: ${formatNumber(snapshot.position.x, 1, 10)} m    Y: ${formatNumber(snapshot.position.y, 1, 10)} m`);
            lines.push(`│ VITESSE     X: ${formatNumber(snapshot.velocity.x, 1, 10)} m/s  Y: ${formatNumber(snapshot.velocity.y, 1, 10)} m/s`);
            lines.push(`│             |v|: ${formatNumber(snapshot.speed, 1)} m/s  Mach: ${formatNumber(snapshot.mach, 3, 6)}  Cd: ${formatNumber(snapshot.dragCoefficient, 4, 6)}`);
            lines.push(`│ ALTITUDE    ${formatNumber(snapshot.altitude, 1, 10)} m`);
            lines.push(`│ GRAVITÉ     X: ${formatNumber(gravity.x, 3, 8)}  Y: ${formatNumber(gravity.y, 3, 8)} m/s²`);
            lines.push(`│ TRAÎNÉE     X: ${formatNumber(drag.x, 3, 8)}  Y: ${formatNumber(drag.y, 3, 8)} m/s²`);
            lines.push(`│ TOTAL       X: ${formatNumber(total.x, 3, 8)}  Y: ${formatNumber(total.y, 3, 8)} m/s²`);
            lines.push('└──────────────────────────────────────────────────────────────');

            if (index < this.snapshotBuffer.length - 1) {
                lines.push('');
            }
        });

        lines.push('');
        lines.push('═══════════════════════════════════════════════════════════════════');

        return lines.join('\n');
    }

    private log(level: LogLevel, message: string, data?: unknown): void {
        if (!this.enabled) return;

        const entry: LogEntry = {
            level,
            message,
            timestamp: Date.now(),
            data,
        };

        this.buffer.add(entry);
        this.callbacks.forEach((cb) => {
            try {
                cb(entry);
            } catch (error) {
                console.error(`Erreur dans abonné du logger pour « ${entry.message} »:`, error);
            }
        });

        if (this.consoleOutput) {
            console.log(`[${level.toUpperCase()}] ${message}`, data ?? '');
        }
    }

    subscribe(callback: (entry: LogEntry) => void): () => void {
        this.callbacks.add(callback);
        return () => {
            this.callbacks.delete(callback);
        };
    }

    setEnabled(enabled: boolean): void {
        this.enabled = enabled;
    }

    isEnabled(): boolean {
        return this.enabled;
    }

    getBuffer(): LogBuffer {
        return this.buffer;
    }

    clear(): void {
        this.buffer.clear();
        this.snapshotBuffer = [];
    }
}

/**
 * Formatteur de logs pour affichage.
 */
export class LogFormatter {
    static formatEntry(entry: LogEntry): string {
        const time = new Date(entry.timestamp).toLocaleTimeString();
        return `[${time}] [${entry.level.toUpperCase()}] ${entry.message}`;
    }

    static formatBuffer(buffer: LogBuffer): string {
        return buffer
            .getAll()
            .map((entry) => this.formatEntry(entry))
            .join('\n');
    }
}
