/**
 * Endpoint functions.
 *
 * Each function takes an {@link ApiContext} (a logged-in `ConnectClient`)
 * and maps its arguments onto one provider path. Responses are returned as
 * decoded JSON, `undefined` for empty bodies.
 *
 * ## Usage
 *
 * ```typescript
 * import { login } from 'garmin-connect-kit/client'
 * import { dailySummary, dailySteps } from 'garmin-connect-kit/api'
 *
 * const client = await login({ tokenDir: '~/.garminconnect' })
 * const summary = await dailySummary(client, '2024-03-01')
 * const steps = await dailySteps(client, '2024-01-01', '2024-03-31')
 * ```
 *
 * @module api
 */

export {
	activities,
	activitiesByDate,
	activity,
	activityCount,
	activityDetails,
	activityExerciseSets,
	activityHrZones,
	type ActivityId,
	type ActivityListOptions,
	activityPowerZones,
	activitySplitSummaries,
	activitySplits,
	activityTypedSplits,
	activityTypes,
	activityWeather,
	createActivity,
	deleteActivity,
	DOWNLOAD_FORMATS,
	type DownloadFormat,
	downloadActivity,
	heartRateActivities,
	lastActivity,
	progressSummary,
	renameActivity,
	updateActivityType,
	uploadActivity,
} from './activities.ts'
export {
	adhocChallenges,
	availableBadgeChallenges,
	availableBadges,
	badgeChallenges,
	earnedBadges,
	goals,
	inProgressBadges,
	nonCompletedBadgeChallenges,
	type PageOptions,
	personalRecords,
	virtualChallenges,
} from './badges.ts'
export {
	addBodyComposition,
	addWeighIn,
	addWeighInWithTimestamps,
	type BloodPressureReading,
	bloodPressure,
	bodyComposition,
	dailyWeighIns,
	deleteBloodPressure,
	deleteWeighIn,
	deleteWeighIns,
	hydration,
	logBloodPressure,
	logHydration,
	type WeightUnit,
	weighIns,
} from './body-composition.ts'
export {
	type ApiContext,
	isRecord,
	recordsOf,
	requireDisplayName,
	requireProfilePk,
	type UserProfile,
} from './context.ts'
export { chunkDateRange, chunkedRequest, type DateInput, formatDate, localTime, today } from './dates.ts'
export {
	activityGear,
	type DeviceAlarms,
	deviceAlarms,
	deviceSettings,
	deviceSolarData,
	devices,
	gear,
	gearActivities,
	gearDefaults,
	gearStats,
	lastUsedDevice,
	linkGear,
	primaryTrainingDevice,
	setGearDefault,
	unlinkGear,
} from './devices.ts'
export {
	bodyBattery,
	bodyBatteryEvents,
	dailyEvents,
	dailySummary,
	floors,
	heartRates,
	hrv,
	intensityMinutes,
	requestReload,
	respiration,
	restingHeartRate,
	sleepData,
	spo2,
	stats,
	statsAndBody,
	stepsData,
	stress,
} from './health.ts'
export {
	cyclingFtp,
	DAILY_STEPS_MAX_DAYS,
	dailySteps,
	enduranceScore,
	fitnessAge,
	hillScore,
	lactateThreshold,
	lactateThresholdHistory,
	maxMetrics,
	morningTrainingReadiness,
	racePredictions,
	type ScoreQuery,
	trainingReadiness,
	trainingStatus,
	weeklyIntensityMinutes,
	weeklySteps,
	weeklyStress,
} from './metrics.ts'
export { personalInformation, socialProfile, userProfile, userSettings } from './user.ts'
export { type GraphqlOptions, graphql, lifestyleLogging, menstrualCalendar, menstrualData, pregnancySummary } from './wellness.ts'
export {
	adaptiveTrainingPlan,
	createWorkout,
	downloadWorkout,
	scheduledWorkout,
	trainingPlan,
	trainingPlans,
	workout,
	workouts,
} from './workouts.ts'
