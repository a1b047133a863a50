/**
 * Texte d'état affiché par-dessus la scène.
 *
 * @module infrastructure/rendering/Hud
 */

import type { Simulation } from '../../core/Simulation';

/**
 * Lignes du HUD : temps de vol, angle, score, état du tir.
 */
export function formatHud(simulation: Simulation): string[] {
    const shots = simulation.getShotsAttempted();
    const score = simulation.getScore();

    let scoreLine = `Score : ${score}/${shots}`;
    if (shots > 0) {
        scoreLine += ` (${(simulation.getHitRate() * 100).toFixed(0)} %)`;
    }

    return [
        `Temps de vol : ${simulation.getTime().toFixed(1)} s`,
        `Angle : ${simulation.getHowitzer().getElevationDegrees().toFixed(1)}°`,
        scoreLine,
        formatStatus(simulation),
    ];
}

function formatStatus(simulation: Simulation): string {
    if (simulation.isFiring()) {
        return 'Obus en vol...';
    }
    if (simulation.getShotsAttempted() === 0) {
        return 'Espace pour tirer';
    }
    return simulation.isTargetHit() ? 'Cible : touchée !' : 'Cible : manquée';
}
